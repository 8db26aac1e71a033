import type {
  BackendKind,
  ModelDescriptor,
  QueryInput,
  QueryParameters,
  ResultPayload,
  TaskType,
} from '../types.js';

/**
 * What an adapter receives: the validated request minus everything that only
 * matters for routing (tier, explicit model id, timeout).
 */
export interface AdapterRequest {
  input: QueryInput;
  taskType: TaskType;
  parameters: QueryParameters;
}

/**
 * One adapter per backend family. Stateless with respect to orchestration:
 * it never touches the registry or health, and it never lets a
 * backend-native error escape; everything thrown is an AdapterError.
 *
 * The signal aborts when the caller's timeout fires. Honouring it is
 * best-effort; the orchestrator returns on time either way.
 */
export interface BackendAdapter {
  readonly kind: BackendKind;
  invoke(descriptor: ModelDescriptor, request: AdapterRequest, signal: AbortSignal): Promise<ResultPayload>;
  /** Cheap liveness check used by probe-based recovery */
  probe?(descriptor: ModelDescriptor, signal: AbortSignal): Promise<boolean>;
}

export type AdapterSet = Partial<Record<BackendKind, BackendAdapter>>;

/** Name of the model at the backend: metadata.runtimeModel, else the registry id. */
export function runtimeModelName(descriptor: ModelDescriptor): string {
  return descriptor.metadata?.runtimeModel ?? descriptor.id;
}
