// packages/records/src/sinks.ts
import { EventEmitter } from 'eventemitter3';

/**
 * Write-only targets the store pushes its derived counts into after every mutation.
 */
export interface CountSinks {
  setArtworkCount(count: number): void;
  setActiveRequestCount(count: number): void;
}

export type IntVariableEvents = {
  change: [value: number];
};

/**
 * Shared integer cell. Listeners on `change` only fire when the value actually moves.
 */
export class IntVariable extends EventEmitter<IntVariableEvents> {
  public readonly initialValue: number;
  private runtimeValue: number;

  constructor(initialValue = 0) {
    super();
    this.initialValue = initialValue;
    this.runtimeValue = initialValue;
  }

  get value(): number {
    return this.runtimeValue;
  }

  set value(next: number) {
    if (next === this.runtimeValue) return;
    this.runtimeValue = next;
    this.emit('change', next);
  }

  resetToInitial(): void {
    // silent, like a fresh session
    this.runtimeValue = this.initialValue;
  }
}

export function countSinksFor(args: {
  artworkCount?: IntVariable | null;
  activeRequestCount?: IntVariable | null;
}): CountSinks {
  const { artworkCount, activeRequestCount } = args;
  return {
    setArtworkCount(count) {
      if (artworkCount) artworkCount.value = count;
    },
    setActiveRequestCount(count) {
      if (activeRequestCount) activeRequestCount.value = count;
    },
  };
}
