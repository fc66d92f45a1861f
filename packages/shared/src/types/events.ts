/**
 * Base interface for all session events.
 * All events include common metadata fields.
 */
export interface BaseEvent {
  /** Schema version for event format compatibility */
  schemaVersion: number;
  /** ISO 8601 timestamp when the event occurred */
  timestamp: string;
  /** Unique identifier for the generation session */
  runId: string;
  /** Event type discriminator */
  type: string;
}

/** Emitted when a generation or iteration session starts. */
export interface SessionStarted extends BaseEvent {
  type: 'SessionStarted';
  payload: {
    mode: 'staged' | 'single-pass' | 'iterate';
    /** Length of the specification in characters */
    specChars: number;
    /** Rough token estimate (chars / 4) */
    specTokenEstimate: number;
  };
}

/** Emitted when the manifest has been decoded */
export interface ManifestPlanned extends BaseEvent {
  type: 'ManifestPlanned';
  payload: {
    paths: string[];
    duplicates: number;
  };
}

/** Emitted when the manifest reply could not be decoded */
export interface ManifestFailed extends BaseEvent {
  type: 'ManifestFailed';
  payload: {
    error: string;
    /** First characters of the raw reply */
    preview: string;
  };
}

/** Emitted before a group is generated */
export interface BatchStarted extends BaseEvent {
  type: 'BatchStarted';
  payload: {
    group: string;
    paths: string[];
    chunkCount: number;
  };
}

/** Emitted when a chunk reply decoded into files */
export interface ChunkGenerated extends BaseEvent {
  type: 'ChunkGenerated';
  payload: {
    group: string;
    requested: string[];
    received: string[];
  };
}

/** Emitted when a chunk reply could not be decoded; its paths go to gap-filling */
export interface ChunkFailed extends BaseEvent {
  type: 'ChunkFailed';
  payload: {
    group: string;
    requested: string[];
    reason: string;
  };
}

/** Emitted when a missing file was produced individually */
export interface GapFillResolved extends BaseEvent {
  type: 'GapFillResolved';
  payload: {
    path: string;
    chars: number;
  };
}

/** Emitted when a missing file could not be produced */
export interface GapFillUnresolved extends BaseEvent {
  type: 'GapFillUnresolved';
  payload: {
    path: string;
    reason: string;
  };
}

/** Emitted when a modification reply has been merged */
export interface IterationApplied extends BaseEvent {
  type: 'IterationApplied';
  payload: {
    changed: string[];
    added: string[];
    totalFiles: number;
  };
}

/** Emitted after artifacts were written to disk */
export interface FilesWritten extends BaseEvent {
  type: 'FilesWritten';
  payload: {
    outputDir: string;
    paths: string[];
    executable: string[];
  };
}

/** Emitted before each completion request */
export interface ProviderRequestStarted extends BaseEvent {
  type: 'ProviderRequestStarted';
  payload: {
    provider: string;
    model: string;
  };
}

/** Emitted when a completion request settles (after retries) */
export interface ProviderRequestFinished extends BaseEvent {
  type: 'ProviderRequestFinished';
  payload: {
    provider: string;
    durationMs: number;
    success: boolean;
    retries: number;
    error?: string;
  };
}

/** Emitted before the CLI asks the operator to approve an action */
export interface ConfirmationRequested extends BaseEvent {
  type: 'ConfirmationRequested';
  payload: {
    action: string;
    details?: string;
    defaultNo: boolean;
  };
}

/** Emitted once the operator (or a flag) answered a confirmation */
export interface ConfirmationResolved extends BaseEvent {
  type: 'ConfirmationResolved';
  payload: {
    approved: boolean;
    /** True when --yes, --non-interactive or a missing TTY decided */
    autoResolved: boolean;
  };
}

/** Emitted when a session completes */
export interface SessionFinished extends BaseEvent {
  type: 'SessionFinished';
  payload: {
    requested: number;
    produced: number;
    unresolved: string[];
    totalTokens: number;
    costUsd: number;
    elapsedMs: number;
  };
}

/**
 * Union of all session event types.
 */
export type GenerationEvent =
  | SessionStarted
  | ManifestPlanned
  | ManifestFailed
  | BatchStarted
  | ChunkGenerated
  | ChunkFailed
  | GapFillResolved
  | GapFillUnresolved
  | IterationApplied
  | FilesWritten
  | ProviderRequestStarted
  | ProviderRequestFinished
  | ConfirmationRequested
  | ConfirmationResolved
  | SessionFinished;

/**
 * Interface for publishing session events.
 * Implementations can write to logs, render progress, etc.
 */
export interface EventBus {
  /**
   * Emit an event to all registered listeners.
   * @param event - The event to emit
   */
  emit(event: GenerationEvent): Promise<void> | void;
}

/** Event shape without the common envelope fields */
export type EventInit<E extends GenerationEvent = GenerationEvent> = E extends GenerationEvent
  ? Pick<E, 'type' | 'payload'>
  : never;

/** Fields every event carries besides its type and payload */
export type EventEnvelope = Omit<BaseEvent, 'type'>;

/**
 * Stamps an event with the schema version, timestamp and run id.
 */
export function createEvent<I extends EventInit>(runId: string, init: I): I & EventEnvelope {
  return {
    ...init,
    schemaVersion: 1,
    timestamp: new Date().toISOString(),
    runId,
  };
}
