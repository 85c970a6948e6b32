// packages/cli/src/commands/shared.ts
import type { Command } from 'commander';

export function getOrCreateSubcommand(program: Command, name: string, description: string): Command {
  const existing = (program.commands ?? []).find((c) => c.name() === name);
  if (existing) return existing;
  return program.command(name).description(description);
}

export function parseCount(raw: string, flag: string, min = 0): number {
  const n = Number(raw);
  if (!Number.isInteger(n) || n < min) {
    throw new Error(`invalid ${flag} "${raw}" (expected an integer >= ${min})`);
  }
  return n;
}

export type CollectionKind = 'artworks' | 'requests';

export function parseCollectionKind(raw: string): CollectionKind {
  const k = String(raw ?? '').trim().toLowerCase();
  if (k === 'artworks' || k === 'requests') return k;
  throw new Error(`invalid collection "${raw}" (expected: artworks|requests)`);
}
