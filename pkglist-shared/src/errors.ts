/**
 * Error types for the I/O edges (catalog and configuration loading).
 * List synchronization itself never throws; absence and bounds are return values.
 */

export abstract class PkgListError extends Error {
  public readonly code: string;
  public readonly context?: Record<string, unknown>;

  protected constructor(message: string, code: string, context?: Record<string, unknown>) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.context = context;
    Object.setPrototypeOf(this, new.target.prototype);
  }

  public toString(): string {
    const contextStr = this.context ? ` | Context: ${JSON.stringify(this.context)}` : '';
    return `[${this.code}] ${this.name}: ${this.message}${contextStr}`;
  }
}

export type CatalogErrorCode = 'CATALOG_READ_ERROR' | 'CATALOG_INVALID';

export class CatalogError extends PkgListError {
  public constructor(message: string, code: CatalogErrorCode, context?: Record<string, unknown>) {
    super(message, code, context);
  }
}

export class ConfigError extends PkgListError {
  public constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'CONFIG_INVALID', context);
  }
}

export function isPkgListError(value: unknown): value is PkgListError {
  return value instanceof PkgListError;
}
