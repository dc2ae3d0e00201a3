import {sendJson} from '../../http'
import type {GatewayRouteLogicHandler} from './types'

export const handleHealthRoute: GatewayRouteLogicHandler = ({response, correlationId}) => {
  sendJson({
    response,
    status: 200,
    correlationId,
    payload: {status: 'ok'}
  })
}
