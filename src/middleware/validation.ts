/**
 * Input Validation Helpers
 *
 * Provides validation functions for API request parameters.
 *
 * @module middleware/validation
 */

import { ValidationError } from './error-handler';
import { limits, defaults } from '../config';
import { LoadTestRequest } from '../types';
import { parseByteSize, mbToBytes } from '../utils';

/** Smallest --vm-bytes stress-ng accepts. */
export const MIN_MEMORY_SIZE_BYTES = 4096;

/**
 * Validates that a value is an integer within a range.
 *
 * Numeric strings are accepted so form posts work as well as JSON.
 *
 * @param value - Value to validate
 * @param fieldName - Name of the field (for error messages)
 * @param min - Minimum allowed value
 * @param max - Maximum allowed value
 * @returns The validated integer value
 * @throws ValidationError if validation fails
 */
export function validateInteger(
  value: unknown,
  fieldName: string,
  min: number,
  max: number
): number {
  if (value === undefined || value === null) {
    throw new ValidationError(`${fieldName} is required`);
  }

  const numValue = typeof value === 'string' && /^\s*-?\d+\s*$/.test(value) ? parseInt(value, 10) : value;

  if (typeof numValue !== 'number' || isNaN(numValue)) {
    throw new ValidationError(`${fieldName} must be a number`, { field: fieldName });
  }

  if (!Number.isInteger(numValue)) {
    throw new ValidationError(`${fieldName} must be an integer`, { field: fieldName });
  }

  if (numValue < min || numValue > max) {
    throw new ValidationError(`${fieldName} must be between ${min} and ${max}`, {
      field: fieldName,
      min,
      max,
      received: numValue,
    });
  }

  return numValue;
}

/**
 * Validates an optional integer parameter, returning a default if not provided.
 *
 * @param value - Value to validate (can be undefined)
 * @param fieldName - Name of the field (for error messages)
 * @param min - Minimum allowed value
 * @param max - Maximum allowed value
 * @param defaultValue - Default value if not provided
 * @returns The validated integer value or default
 * @throws ValidationError if validation fails
 */
export function validateOptionalInteger(
  value: unknown,
  fieldName: string,
  min: number,
  max: number,
  defaultValue: number
): number {
  if (value === undefined || value === null || value === '') {
    return defaultValue;
  }

  return validateInteger(value, fieldName, min, max);
}

/**
 * Validates a memory size string and returns its byte count.
 *
 * @param value - Size string such as "512M"
 * @param fieldName - Name of the field (for error messages)
 * @param maxBytes - Largest accepted size
 * @throws ValidationError if the value is not a byte quantity within bounds
 */
export function validateByteSize(value: unknown, fieldName: string, maxBytes: number): number {
  if (typeof value !== 'string') {
    throw new ValidationError(`${fieldName} must be a string such as "512M"`, { field: fieldName });
  }

  const bytes = parseByteSize(value);
  if (bytes === null) {
    throw new ValidationError(`${fieldName} must be a byte quantity such as "512M" or "2G"`, {
      field: fieldName,
      received: value,
    });
  }

  if (bytes < MIN_MEMORY_SIZE_BYTES || bytes > maxBytes) {
    throw new ValidationError(`${fieldName} must be between ${MIN_MEMORY_SIZE_BYTES} and ${maxBytes} bytes`, {
      field: fieldName,
      min: MIN_MEMORY_SIZE_BYTES,
      max: maxBytes,
      received: value,
    });
  }

  return bytes;
}

/**
 * Validates the body of a POST /stress request.
 *
 * Omitted fields take the values in `defaults`. Worker counts may be zero,
 * but not both. The memory size is only checked when VM workers are
 * requested, since it is not passed to the stressor otherwise.
 *
 * @param body - Raw request body (JSON or form fields)
 * @returns Validated load test request
 * @throws ValidationError if validation fails
 */
export function validateLoadTestRequest(body: unknown): LoadTestRequest {
  const fields = toFields(body);

  const cpuWorkers = validateOptionalInteger(
    fields.cpu_workers,
    'cpu_workers',
    limits.minWorkers,
    limits.maxWorkers,
    defaults.cpuWorkers
  );
  const memoryWorkers = validateOptionalInteger(
    fields.memory_workers,
    'memory_workers',
    limits.minWorkers,
    limits.maxWorkers,
    defaults.memoryWorkers
  );
  const durationSeconds = validateOptionalInteger(
    fields.duration,
    'duration',
    limits.minDurationSeconds,
    limits.maxDurationSeconds,
    defaults.durationSeconds
  );

  if (cpuWorkers === 0 && memoryWorkers === 0) {
    throw new ValidationError('At least one of cpu_workers or memory_workers must be greater than 0', {
      cpu_workers: cpuWorkers,
      memory_workers: memoryWorkers,
    });
  }

  // An empty form field falls back to the default like the integer fields
  const rawSize =
    fields.memory_size === undefined || fields.memory_size === null || fields.memory_size === ''
      ? defaults.memorySize
      : fields.memory_size;
  // A bare number is taken as a byte count
  const memorySize =
    typeof rawSize === 'number' && Number.isInteger(rawSize)
      ? String(rawSize)
      : typeof rawSize === 'string'
        ? rawSize.trim()
        : rawSize;
  const memoryBytes =
    memoryWorkers > 0
      ? validateByteSize(memorySize, 'memory_size', mbToBytes(limits.maxMemorySizeMb))
      : (typeof memorySize === 'string' ? parseByteSize(memorySize) : null) ?? 0;

  return {
    cpuWorkers,
    memoryWorkers,
    durationSeconds,
    memorySize: typeof memorySize === 'string' ? memorySize : defaults.memorySize,
    memoryBytes,
  };
}

/**
 * Copies a request body into a plain field map.
 *
 * @throws ValidationError if the body is not a JSON object
 */
function toFields(body: unknown): Record<string, unknown> {
  if (body === undefined) {
    return {};
  }
  if (typeof body !== 'object' || body === null || Array.isArray(body)) {
    throw new ValidationError('Request body must be an object');
  }
  return Object.fromEntries(Object.entries(body));
}

/**
 * Validates a UUID format.
 *
 * @param value - Value to validate
 * @param fieldName - Name of the field (for error messages)
 * @returns The validated UUID string
 * @throws ValidationError if validation fails
 */
export function validateUuid(value: unknown, fieldName: string): string {
  if (typeof value !== 'string') {
    throw new ValidationError(`${fieldName} must be a string`);
  }

  const uuidRegex = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;
  if (!uuidRegex.test(value)) {
    throw new ValidationError(`${fieldName} must be a valid UUID`);
  }

  return value;
}
