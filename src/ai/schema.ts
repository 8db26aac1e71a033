import type { z } from 'zod';
import { type Result, ok, err } from '../types/index.js';
import { SchemaValidationError } from './errors.js';
import { describeInput } from './task-inference.js';
import {
  type BackendKind,
  INPUT_SCHEMA_BY_BACKEND,
  type QueryInput,
  type ResultPayload,
  RESULT_SCHEMA_BY_BACKEND,
} from './types.js';

/**
 * Validate a payload against a canonical shape.
 *
 * Returns the parsed value (defaults applied, unknown keys stripped unless the
 * shape is strict) or a SchemaValidationError listing every issue.
 */
export function validate<S extends z.ZodTypeAny>(
  payload: unknown,
  shape: S,
  subject: string = 'payload',
): Result<z.output<S>, SchemaValidationError> {
  const parsed = shape.safeParse(payload);
  if (!parsed.success) {
    return err(SchemaValidationError.fromZod(subject, parsed.error.issues));
  }
  return ok(parsed.data);
}

/**
 * Validate a result against the one shape its backend kind may produce.
 * A well-formed chat message coming back from a classifier is still rejected.
 */
export function validateResult(
  backendKind: BackendKind,
  payload: unknown,
): Result<ResultPayload, SchemaValidationError> {
  return validate(payload, RESULT_SCHEMA_BY_BACKEND[backendKind], `${backendKind} result`);
}

/**
 * Check that a backend kind can take the request's input before anything is
 * sent to it. A string handed to a vision model is the caller's mistake.
 */
export function validateInput(
  backendKind: BackendKind,
  input: QueryInput,
): Result<QueryInput, SchemaValidationError> {
  const parsed = INPUT_SCHEMA_BY_BACKEND[backendKind].safeParse(input);
  if (!parsed.success) {
    return err(
      new SchemaValidationError(`${backendKind} input`, [`input: ${backendKind} models cannot take ${describeInput(input)} input`]),
    );
  }
  return ok(input);
}
