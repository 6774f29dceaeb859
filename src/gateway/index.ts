/**
 * Gateway module exports
 */

export {
  GatewayServer,
  DEFAULT_GATEWAY_CONFIG,
  type GatewayConfig,
  type SessionFactory,
  type ClientMessage,
  type ServerMessage,
} from './gateway-server.js';
