/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { isLosslessNumber, isSafeNumber, LosslessNumber, parse, stringify } from 'lossless-json';
import type { JsonObject, JsonValue } from './types.js';

export const isJsonObject = (value: unknown): value is JsonObject =>
  typeof value === 'object' &&
  value !== null &&
  !Array.isArray(value) &&
  !isLosslessNumber(value);

export const isJsonValue = (value: unknown): value is JsonValue => {
  if (
    value === null ||
    typeof value === 'string' ||
    typeof value === 'number' ||
    typeof value === 'boolean' ||
    isLosslessNumber(value)
  ) {
    return true;
  }
  if (Array.isArray(value)) {
    return value.every(isJsonValue);
  }
  if (isJsonObject(value)) {
    return Object.values(value).every(isJsonValue);
  }
  return false;
};

// Plain numbers where a double holds the digits exactly, LosslessNumber otherwise.
const parseNumber = (text: string): number | LosslessNumber =>
  isSafeNumber(text) ? Number(text) : new LosslessNumber(text);

export const parseJson = (text: string): JsonValue => {
  const parsed = parse(text, null, parseNumber);
  if (!isJsonValue(parsed)) {
    throw new TypeError('Parsed JSON contains values outside the JSON data model.');
  }
  return parsed;
};

/**
 * Two-space indented JSON, matching `JSON.stringify(value, undefined, 2)` apart from
 * large numbers keeping their digits.
 */
export const stringifyJson = (value: JsonValue): string => {
  const text = stringify(value, undefined, 2);
  if (text === undefined) {
    throw new TypeError('Value cannot be serialized as JSON.');
  }
  return text;
};
