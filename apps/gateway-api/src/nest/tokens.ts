export const GATEWAY_API_RUNTIME = Symbol('GATEWAY_API_RUNTIME')
export const GATEWAY_API_REQUEST_HANDLER = Symbol('GATEWAY_API_REQUEST_HANDLER')
