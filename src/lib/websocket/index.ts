export {
  classifyCloseCode,
  createWebSocketManager,
  WebSocketClosedError,
  type CloseCategory,
  type WebSocketConfig,
  type WebSocketManager,
  type WebSocketState,
} from "./websocket";
