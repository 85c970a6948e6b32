// packages/records/src/log.ts

/**
 * Diagnostics sink. Defaults to `console`; tests pass a collector.
 */
export type Logger = Pick<Console, 'warn'>;

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
