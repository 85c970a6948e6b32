// packages/records/src/types.ts

export type Color32 = {
  r: number;
  g: number;
  b: number;
  a: number;
};

export type PixelEntry = {
  x: number;
  y: number;
  color: Color32;
};

export const CONSTRAINT_TYPES = [
  'colorLimit',
  'timeLimit',
  'symmetryRequired',
  'pixelLimit',
  'paletteRestriction',
] as const;

export type ConstraintType = (typeof CONSTRAINT_TYPES)[number];

export type ConstraintData = {
  type: ConstraintType;
  intValue: number;
  floatValue: number;
  boolValue: boolean;
};

/**
 * A saved drawing. The store only ever looks at `id` and `isLiked`;
 * everything else is payload carried through save/load.
 */
export type ArtworkRecord = {
  id: string;
  name: string;
  pixels: PixelEntry[];
  width: number;
  height: number;
  createdTimestamp: number; // unix seconds
  isLiked: boolean;
};

export type RequestRecord = {
  id: string;
  prompt: string;
  constraints: ConstraintData[];

  /**
   * One-way flag: set by `completeRequest`, never reset by the store.
   */
  isCompleted: boolean;
};

export function isConstraintType(x: unknown): x is ConstraintType {
  return typeof x === 'string' && (CONSTRAINT_TYPES as readonly string[]).includes(x);
}

export function withLikeToggled(artwork: ArtworkRecord): ArtworkRecord {
  return { ...artwork, isLiked: !artwork.isLiked };
}

export function withCompleted(request: RequestRecord): RequestRecord {
  return { ...request, isCompleted: true };
}
