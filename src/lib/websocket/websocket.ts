/**
 * Single-use WebSocket connection manager.
 *
 * A manager owns at most one socket for its whole life. Once the socket
 * closes, from either side, the manager is CLOSED and cannot reconnect;
 * callers build a new one. Closing it is the only cancellation primitive.
 */

import WebSocket from "ws";

export type WebSocketState = "DISCONNECTED" | "CONNECTING" | "CONNECTED" | "CLOSED";

/**
 * Close code categories, used to label disconnects in logs and events.
 */
export type CloseCategory = "AUTH_FAILURE" | "RATE_LIMITED" | "NORMAL" | "UNKNOWN";

/**
 * @see https://developer.mozilla.org/en-US/docs/Web/API/CloseEvent/code
 */
export const classifyCloseCode = (code: number): CloseCategory => {
  if (code === 4401 || code === 4403 || code === 1008) return "AUTH_FAILURE";
  if (code === 4429 || code === 1013) return "RATE_LIMITED";
  if (code === 1000 || code === 1001 || code === 1006) return "NORMAL";
  return "UNKNOWN";
};

export interface WebSocketConfig {
  url: string;
  protocols?: string[];
}

export interface WebSocketManager {
  /** Open the socket (single-flight); rejects if it fails before opening */
  connect(): Promise<void>;
  /** Close the socket without notifying close handlers */
  close(code?: number, reason?: string): void;
  getState(): WebSocketState;

  /** Called for each inbound message, JSON-decoded when possible */
  onMessage(handler: (data: unknown) => void): () => void;
  /** Called once when the remote side closes the socket */
  onClose(handler: (code: number, reason: string, category: CloseCategory) => void): () => void;
  onError(handler: (error: Error) => void): () => void;
}

/**
 * Error thrown when using a manager whose socket has closed.
 */
export class WebSocketClosedError extends Error {
  constructor(message = "WebSocket is closed") {
    super(message);
    this.name = "WebSocketClosedError";
  }
}

const decodeRawData = (data: WebSocket.RawData): string => {
  if (Buffer.isBuffer(data)) return data.toString("utf-8");
  if (Array.isArray(data)) return Buffer.concat(data).toString("utf-8");
  return Buffer.from(data).toString("utf-8");
};

const parseMessage = (text: string): unknown => {
  try {
    return JSON.parse(text);
  } catch {
    // Non-JSON frames reach handlers as raw text
    return text;
  }
};

/**
 * @example
 * ```typescript
 * const socket = createWebSocketManager({
 *   url: "wss://ws.testnet.bitmex.com/realtime?subscribe=orderBookL2:XBTUSD",
 * });
 *
 * socket.onMessage((data) => sync.handleMessage(data));
 * socket.onClose((code, reason) => logger.warn("Stream closed", { code, reason }));
 *
 * await socket.connect();
 * ```
 */
export const createWebSocketManager = (config: WebSocketConfig): WebSocketManager => {
  const { url, protocols } = config;

  let state: WebSocketState = "DISCONNECTED";
  let ws: WebSocket | null = null;
  let connectPromise: Promise<void> | null = null;
  let rejectPending: ((error: Error) => void) | null = null;

  const messageHandlers = new Set<(data: unknown) => void>();
  const closeHandlers = new Set<(code: number, reason: string, category: CloseCategory) => void>();
  const errorHandlers = new Set<(error: Error) => void>();

  const setState = (newState: WebSocketState): void => {
    state = newState;
  };

  const emitError = (error: Error): void => {
    for (const handler of errorHandlers) {
      handler(error);
    }
  };

  const teardown = (code?: number, reason?: string): void => {
    if (ws) {
      ws.removeAllListeners();
      // a late error after teardown must not crash the process
      ws.on("error", () => {});
      if (ws.readyState === WebSocket.OPEN || ws.readyState === WebSocket.CONNECTING) {
        ws.close(code, reason);
      }
      ws = null;
    }
  };

  const handleConnect = (): Promise<void> =>
    new Promise<void>((resolve, reject) => {
      setState("CONNECTING");
      const socket = new WebSocket(url, protocols);
      ws = socket;
      rejectPending = reject;
      let opened = false;

      socket.on("open", () => {
        opened = true;
        rejectPending = null;
        setState("CONNECTED");
        resolve();
      });

      socket.on("error", (error: Error) => {
        emitError(error);
        if (!opened) {
          rejectPending = null;
          teardown();
          setState("CLOSED");
          reject(error);
        }
      });

      socket.on("close", (code: number, reason: Buffer) => {
        ws = null;
        socket.removeAllListeners();
        setState("CLOSED");
        if (!opened) {
          rejectPending = null;
          reject(new WebSocketClosedError(`WebSocket closed before opening (code ${code})`));
          return;
        }
        const reasonStr = reason.toString("utf-8");
        const category = classifyCloseCode(code);
        for (const handler of closeHandlers) {
          handler(code, reasonStr, category);
        }
      });

      socket.on("message", (data: WebSocket.RawData) => {
        const parsed = parseMessage(decodeRawData(data));
        for (const handler of messageHandlers) {
          handler(parsed);
        }
      });
    });

  const connect = async (): Promise<void> => {
    if (connectPromise) {
      return connectPromise;
    }
    if (state === "CONNECTED") {
      return;
    }
    if (state === "CLOSED") {
      throw new WebSocketClosedError("WebSocket is closed and cannot reconnect");
    }

    connectPromise = handleConnect();
    try {
      await connectPromise;
    } finally {
      connectPromise = null;
    }
  };

  const close = (code?: number, reason?: string): void => {
    teardown(code, reason);
    setState("CLOSED");
    if (rejectPending) {
      const reject = rejectPending;
      rejectPending = null;
      reject(new WebSocketClosedError("WebSocket closed while connecting"));
    }
  };

  const subscribe =
    <H>(handlers: Set<H>) =>
    (handler: H): (() => void) => {
      handlers.add(handler);
      return () => {
        handlers.delete(handler);
      };
    };

  return {
    connect,
    close,
    getState: () => state,
    onMessage: subscribe(messageHandlers),
    onClose: subscribe(closeHandlers),
    onError: subscribe(errorHandlers),
  };
};
