import { RegistryError } from "./errors.js";
import type { RegistryEvent, RegistryEventListener } from "./events.js";
import type { Address, NameRecord, NamespaceRecord } from "./types.js";

type UndoEntry = () => void;

type ActiveTransaction = {
  undo: UndoEntry[];
  events: RegistryEvent[];
  restores: Array<() => void>;
};

/**
 * An external collaborator that can join registry transactions. `checkpoint`
 * is taken when a transaction opens; the returned function restores that
 * checkpoint if the transaction fails.
 */
export interface TransactionParticipant {
  checkpoint(): () => void;
}

export const isTransactionParticipant = (value: unknown): value is TransactionParticipant =>
  typeof value === "object" &&
  value !== null &&
  "checkpoint" in value &&
  typeof value.checkpoint === "function";

/** Map whose writes are only legal inside a transaction and are undone on abort. Values are never undefined. */
export class JournaledMap<K, V> {
  private readonly entries = new Map<K, V>();
  private readonly undoLog: () => UndoEntry[];

  constructor(undoLog: () => UndoEntry[]) {
    this.undoLog = undoLog;
  }

  get(key: K) {
    return this.entries.get(key);
  }

  has(key: K) {
    return this.entries.has(key);
  }

  get size() {
    return this.entries.size;
  }

  set(key: K, value: V) {
    const log = this.undoLog();
    const previous = this.entries.get(key);
    log.push(previous === undefined ? () => this.entries.delete(key) : () => this.entries.set(key, previous));
    this.entries.set(key, value);
  }

  delete(key: K) {
    const log = this.undoLog();
    const previous = this.entries.get(key);
    if (previous === undefined) return;
    log.push(() => this.entries.set(key, previous));
    this.entries.delete(key);
  }
}

export class JournaledCell<T> {
  private current: T;
  private readonly undoLog: () => UndoEntry[];

  constructor(initial: T, undoLog: () => UndoEntry[]) {
    this.current = initial;
    this.undoLog = undoLog;
  }

  get() {
    return this.current;
  }

  set(value: T) {
    const previous = this.current;
    this.undoLog().push(() => {
      this.current = previous;
    });
    this.current = value;
  }
}

export type ListenerErrorHandler = (error: unknown, event: RegistryEvent) => void;

const rethrowLater: ListenerErrorHandler = (error) => {
  queueMicrotask(() => {
    throw error;
  });
};

/**
 * The registry's whole mutable state plus its transaction boundary. One
 * instance per registry; components receive it explicitly.
 */
export class RegistryStore {
  private active: ActiveTransaction | null = null;
  private readonly participants: TransactionParticipant[] = [];
  private readonly listeners = new Set<RegistryEventListener>();
  private readonly onListenerError: ListenerErrorHandler;

  /** `label.namespace` → owner */
  readonly names = new JournaledMap<string, Address>(() => this.undoLog());
  /** owner → the one name it holds */
  readonly owners = new JournaledMap<Address, NameRecord>(() => this.undoLog());
  readonly namespaces = new JournaledMap<string, NamespaceRecord>(() => this.undoLog());
  /** Legacy reverse index, public namespaces only. */
  readonly publicPrices = new JournaledMap<bigint, string>(() => this.undoLog());
  readonly pendingFees = new JournaledMap<Address, bigint>(() => this.undoLog());
  readonly operator: JournaledCell<Address>;
  readonly pendingOperator: JournaledCell<Address | null>;

  constructor(operator: Address, options: { onListenerError?: ListenerErrorHandler } = {}) {
    this.operator = new JournaledCell<Address>(operator, () => this.undoLog());
    this.pendingOperator = new JournaledCell<Address | null>(null, () => this.undoLog());
    this.onListenerError = options.onListenerError ?? rethrowLater;
  }

  get inTransaction() {
    return this.active !== null;
  }

  enlist(participant: TransactionParticipant) {
    this.participants.push(participant);
  }

  subscribe(listener: RegistryEventListener) {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  emit(event: RegistryEvent) {
    this.requireActive().events.push(event);
  }

  /**
   * Runs `fn` as one atomic operation. Nested calls are rejected, which is
   * what keeps delegate callbacks from mutating the registry mid-operation.
   */
  transact<T>(fn: () => T): T {
    if (this.active) {
      throw new RegistryError("reentrant_call");
    }
    const transaction: ActiveTransaction = {
      undo: [],
      events: [],
      restores: this.participants.map((participant) => participant.checkpoint())
    };
    this.active = transaction;
    let result: T;
    try {
      result = fn();
    } catch (error) {
      for (let i = transaction.undo.length - 1; i >= 0; i -= 1) {
        transaction.undo[i]();
      }
      for (let i = transaction.restores.length - 1; i >= 0; i -= 1) {
        transaction.restores[i]();
      }
      this.active = null;
      throw error;
    }
    this.active = null;
    this.deliver(transaction.events);
    return result;
  }

  private deliver(events: RegistryEvent[]) {
    for (const event of events) {
      for (const listener of this.listeners) {
        try {
          listener(event);
        } catch (error) {
          this.onListenerError(error, event);
        }
      }
    }
  }

  private requireActive() {
    if (!this.active) {
      throw new Error("mutation_outside_transaction");
    }
    return this.active;
  }

  private undoLog() {
    return this.requireActive().undo;
  }
}
