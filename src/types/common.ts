/**
 * Shared utility types.
 */

export interface PaginationOptions {
  limit: number;
  offset: number;
}

export interface PaginatedResult<T> {
  data: T[];
  total: number;
  limit: number;
  offset: number;
}

export type FieldType = 'string' | 'number' | 'boolean' | 'array' | 'object';

export interface FieldSchema {
  type: FieldType;
  required: boolean;
  maxLength?: number;
  min?: number;
  max?: number;
  enum?: readonly (string | number)[];
}

export type BodySchema = Record<string, FieldSchema>;
