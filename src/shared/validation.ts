/**
 * Validation utilities for strict type safety at the worker boundary
 *
 * Provides branded types, assertion functions, and debug-only checks
 * to ensure data integrity before it reaches the physics core.
 */

import type { EntityId } from "./types/entity";
import type { Vector3Data } from "./types/spacetime";

// ============================================
// Branded Types
// ============================================

/**
 * BufferIndex - branded type for validated buffer indices
 * Ensures index has been validated before use in buffer operations
 */
export type BufferIndex = number & { readonly __brand: "BufferIndex" };

// ============================================
// Assertion Functions
// ============================================

/**
 * Assert that a buffer index is within valid bounds
 * @throws Error if index is out of bounds
 */
export function assertBufferIndexInBounds(
  index: number,
  maxEntities: number,
  context: string,
): asserts index is BufferIndex {
  if (typeof index !== "number" || !Number.isInteger(index)) {
    throw new Error(
      `[${context}] Buffer index must be an integer, got: ${typeof index} (${index})`,
    );
  }
  if (index < 0 || index >= maxEntities) {
    throw new Error(
      `[${context}] Buffer index ${index} out of bounds. ` +
        `Valid range: 0-${maxEntities - 1}`,
    );
  }
}

/**
 * Assert that a value is initialized (not null or undefined)
 * @throws Error if value is null or undefined
 */
export function assertInitialized<T>(
  value: T | null | undefined,
  name: string,
  context: string,
): asserts value is T {
  if (value === null || value === undefined) {
    throw new Error(`[${context}] ${name} not initialized. Call init() first.`);
  }
}

/**
 * Assert that an EntityId is valid
 * @throws Error if EntityId is not a positive integer
 */
export function assertValidEntityId(
  id: unknown,
  context: string,
): asserts id is EntityId {
  if (typeof id !== "number" || !Number.isInteger(id) || id <= 0) {
    throw new Error(
      `[${context}] Invalid EntityId: ${id}. Must be a positive integer.`,
    );
  }
}

/**
 * Assert that a looked-up entity exists
 * @throws Error if the lookup returned undefined
 */
export function assertEntityExists<T>(
  entity: T | undefined,
  id: EntityId,
  context: string,
): asserts entity is T {
  if (entity === undefined) {
    throw new Error(`[${context}] Entity ${id} does not exist in the universe.`);
  }
}

/**
 * Assert that a 3-vector has three finite components
 * @throws Error if any component is NaN, infinite or not a number
 */
export function assertFiniteVector(
  value: unknown,
  name: string,
  context: string,
): asserts value is Vector3Data {
  if (typeof value !== "object" || value === null) {
    throw new Error(`[${context}] ${name} must be an {x, y, z} object.`);
  }
  for (const axis of ["x", "y", "z"] as const) {
    const component: unknown = Reflect.get(value, axis);
    if (typeof component !== "number" || !Number.isFinite(component)) {
      throw new Error(
        `[${context}] ${name}.${axis} must be a finite number, got: ${String(component)}`,
      );
    }
  }
}

/**
 * Assert that a scalar is a finite number
 * @throws Error if value is NaN, infinite or not a number
 */
export function assertFiniteNumber(
  value: unknown,
  name: string,
  context: string,
): asserts value is number {
  if (typeof value !== "number" || !Number.isFinite(value)) {
    throw new Error(
      `[${context}] ${name} must be a finite number, got: ${String(value)}`,
    );
  }
}

// ============================================
// Debug Assertions
// ============================================

const isDev = (): boolean => process.env.NODE_ENV !== "production";

/**
 * Debug-only assertion that is skipped in production
 * Use for performance-sensitive code paths where you want validation
 * during development but not in production
 *
 * @param condition - Condition that should be true
 * @param message - Error message if condition is false
 */
export function debugAssert(
  condition: boolean,
  message: string,
): asserts condition {
  if (isDev() && !condition) {
    throw new Error(`[Debug Assertion Failed] ${message}`);
  }
}

// ============================================
// Validation Result Type
// ============================================

/**
 * Result type for validations that shouldn't throw
 */
export type ValidationResult<T> =
  | { success: true; value: T }
  | { success: false; error: string };

/**
 * Validate a buffer index without throwing
 */
export function validateBufferIndex(
  index: number,
  maxEntities: number,
): ValidationResult<BufferIndex> {
  if (typeof index !== "number" || !Number.isInteger(index)) {
    return {
      success: false,
      error: `Buffer index must be an integer, got: ${typeof index}`,
    };
  }
  if (index < 0 || index >= maxEntities) {
    return {
      success: false,
      error: `Buffer index ${index} out of bounds (max: ${maxEntities - 1})`,
    };
  }
  return { success: true, value: index as BufferIndex };
}
