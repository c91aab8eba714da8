/**
 * In-memory state store for the connector worker.
 *
 * Each update replaces the affected slice; readers never see a half-applied
 * reconciliation pass.
 */

import type {
  Balance,
  ConnectorEvent,
  ConnectorEventType,
  Execution,
  ExecutionBatch,
  ExecutionCursor,
  PlacedOrder,
  Position,
} from "@/adapters";

/** Executions kept per symbol for inspection */
export const RECENT_EXECUTIONS_LIMIT = 100;

export interface SymbolState {
  /** Resume point for the next execution reconciliation pass */
  cursor: ExecutionCursor | null;
  /** Total executions reconciled since start */
  executionCount: number;
  /** Most recent executions, oldest first */
  recentExecutions: Execution[];
  openOrders: Map<string, PlacedOrder>;
  lastReconcile: Date | null;
}

/**
 * Worker state containing reconciled account data and health tracking.
 */
export interface WorkerState {
  symbols: Map<string, SymbolState>;

  // Account data
  balances: Map<string, Balance>;
  positions: Map<string, Position>;
  fillRatio: number[];

  // Health tracking
  lastAccountUpdate: Date | null;
  lastFillRatioUpdate: Date | null;
  eventCounts: Record<ConnectorEventType, number>;
}

/**
 * State store interface for managing worker state.
 */
export interface StateStore {
  getState(): Readonly<WorkerState>;
  getSymbol(symbol: string): Readonly<SymbolState>;
  recordExecutions(symbol: string, batch: ExecutionBatch): void;
  updateOrders(symbol: string, orders: PlacedOrder[]): void;
  updateBalances(balances: Balance[]): void;
  updatePositions(positions: Position[]): void;
  updateFillRatio(samples: number[]): void;
  recordEvent(event: ConnectorEvent): void;
}

const emptySymbol = (): SymbolState => ({
  cursor: null,
  executionCount: 0,
  recentExecutions: [],
  openOrders: new Map(),
  lastReconcile: null,
});

const initialState = (): WorkerState => ({
  symbols: new Map(),
  balances: new Map(),
  positions: new Map(),
  fillRatio: [],
  lastAccountUpdate: null,
  lastFillRatioUpdate: null,
  eventCounts: {
    PROTOCOL_VIOLATION: 0,
    STREAM_CLOSED: 0,
    UNEXPECTED_ORDER_STATUS: 0,
    UNEXPECTED_CANCEL_STATUS: 0,
  },
});

/**
 * Create a new state store instance.
 */
export const createStateStore = (now: () => number = Date.now): StateStore => {
  let state = initialState();

  const getSymbol = (symbol: string): SymbolState => state.symbols.get(symbol) ?? emptySymbol();

  const updateSymbol = (symbol: string, patch: Partial<SymbolState>): void => {
    const symbols = new Map(state.symbols);
    symbols.set(symbol, { ...getSymbol(symbol), ...patch });
    state = { ...state, symbols };
  };

  return {
    getState: (): Readonly<WorkerState> => state,

    getSymbol,

    recordExecutions: (symbol: string, batch: ExecutionBatch): void => {
      const current = getSymbol(symbol);
      updateSymbol(symbol, {
        cursor: batch.cursor,
        executionCount: current.executionCount + batch.executions.length,
        recentExecutions: [...current.recentExecutions, ...batch.executions].slice(
          -RECENT_EXECUTIONS_LIMIT,
        ),
        lastReconcile: new Date(now()),
      });
    },

    updateOrders: (symbol: string, orders: PlacedOrder[]): void => {
      const openOrders = new Map<string, PlacedOrder>();
      for (const order of orders) {
        openOrders.set(order.id, order);
      }
      updateSymbol(symbol, { openOrders });
    },

    updateBalances: (balances: Balance[]): void => {
      const balancesMap = new Map<string, Balance>();
      for (const balance of balances) {
        balancesMap.set(balance.asset, balance);
      }
      state = {
        ...state,
        balances: balancesMap,
        lastAccountUpdate: new Date(now()),
      };
    },

    updatePositions: (positions: Position[]): void => {
      const positionsMap = new Map<string, Position>();
      for (const position of positions) {
        positionsMap.set(position.symbol, position);
      }
      state = {
        ...state,
        positions: positionsMap,
        lastAccountUpdate: new Date(now()),
      };
    },

    updateFillRatio: (samples: number[]): void => {
      state = {
        ...state,
        fillRatio: [...samples],
        lastFillRatioUpdate: new Date(now()),
      };
    },

    recordEvent: (event: ConnectorEvent): void => {
      state = {
        ...state,
        eventCounts: {
          ...state.eventCounts,
          [event.type]: state.eventCounts[event.type] + 1,
        },
      };
    },
  };
};
