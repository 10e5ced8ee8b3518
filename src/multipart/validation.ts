/**
 * Parameter validation for CompleteMultipartUpload
 * @module s3-complete-multipart/multipart/validation
 */

import type { CompleteMultipartUploadInput, Optional } from '../types/index.js';
import { ValidationError } from '../errors/index.js';

/**
 * Fields that must be set, in the order they are checked
 */
export const REQUIRED_FIELDS = ['Bucket', 'Key', 'UploadId'] as const;

export type RequiredField = (typeof REQUIRED_FIELDS)[number];

/**
 * Input whose required fields are known to be present
 */
export type ValidatedInput = CompleteMultipartUploadInput & {
  readonly [F in RequiredField]: string;
};

/**
 * Returns the value of a required field
 *
 * @throws {ValidationError} MissingRequiredField when the value is null or undefined
 */
export function requireField(field: RequiredField, value: Optional<string>): string {
  if (value === undefined || value === null) {
    throw ValidationError.missingRequiredField(field);
  }
  return value;
}

/**
 * Checks that bucket, key and upload ID are present.
 *
 * Reports the first missing field in declaration order. An empty string is
 * present; only null and undefined count as missing.
 *
 * @throws {ValidationError} MissingRequiredField naming the field
 */
export function validateCompleteMultipartInput(
  input: CompleteMultipartUploadInput
): ValidatedInput {
  return {
    ...input,
    Bucket: requireField('Bucket', input.Bucket),
    Key: requireField('Key', input.Key),
    UploadId: requireField('UploadId', input.UploadId),
  };
}

/**
 * Checks a value against a closed set
 *
 * @throws {ValidationError} InvalidEnumValue naming the field and value
 */
export function requireEnumValue(
  field: string,
  value: string,
  allowed: readonly string[]
): string {
  if (!allowed.includes(value)) {
    throw ValidationError.invalidEnumValue(field, value, allowed);
  }
  return value;
}
