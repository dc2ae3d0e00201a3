import 'reflect-metadata'

import type {IncomingMessage, ServerResponse} from 'node:http'

import {All, Controller, DynamicModule, Inject, Module, Req, Res} from '@nestjs/common'
import type {Request, Response} from 'express'

import {createGatewayRequestHandler} from '../http/requestHandler'
import type {GatewayRouteHandler, RouteRuntime} from '../http/routes/types'
import {GATEWAY_API_REQUEST_HANDLER, GATEWAY_API_RUNTIME} from './tokens'

@Controller()
class GatewayApiController {
  public constructor(
    @Inject(GATEWAY_API_REQUEST_HANDLER)
    private readonly requestHandler: GatewayRouteHandler
  ) {}

  @All('*')
  public async handle(@Req() request: Request, @Res() response: Response): Promise<void> {
    await this.requestHandler(
      request as unknown as IncomingMessage,
      response as unknown as ServerResponse
    )
  }
}

@Module({
  controllers: [GatewayApiController]
})
export class GatewayApiNestModule {
  public static register(runtime: RouteRuntime): DynamicModule {
    return {
      module: GatewayApiNestModule,
      providers: [
        {
          provide: GATEWAY_API_RUNTIME,
          useValue: runtime
        },
        {
          provide: GATEWAY_API_REQUEST_HANDLER,
          inject: [GATEWAY_API_RUNTIME],
          useFactory: (routeRuntime: RouteRuntime) => createGatewayRequestHandler(routeRuntime)
        }
      ]
    }
  }
}
