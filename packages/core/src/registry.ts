/**
 * Registry of defined record schemas, keyed by record name
 */

import { LOG_PREFIX, config } from '@recordsmith/shared';
import type { RecordSchema } from './types';

export class SchemaRegistry {
  private schemas: Map<string, RecordSchema> = new Map();

  /**
   * Register a schema. Reusing a name with a different field list is allowed,
   * but such records never compare equal, so it is reported.
   */
  register(schema: RecordSchema): void {
    const existing = this.schemas.get(schema.name);

    if (existing && existing.fingerprint !== schema.fingerprint && config.warnOnRedefine) {
      console.warn(
        `${LOG_PREFIX} Record ${schema.name} is already defined as ${existing.fingerprint}. ` +
          `Redefining as ${schema.fingerprint}.`
      );
    }

    this.schemas.set(schema.name, schema);
  }

  /**
   * Forget a schema
   */
  unregister(name: string): void {
    this.schemas.delete(name);
  }

  /**
   * Most recently registered schema for a name
   */
  get(name: string): RecordSchema | undefined {
    return this.schemas.get(name);
  }

  /**
   * List all registered schemas
   */
  list(): RecordSchema[] {
    return [...this.schemas.values()];
  }

  has(name: string): boolean {
    return this.schemas.has(name);
  }

  clear(): void {
    this.schemas.clear();
  }
}

// Singleton instance
export const schemaRegistry = new SchemaRegistry();
