/**
 * Removal Reasons
 *
 * Closed code enumerations written into the vertex and face reason buffers.
 * The numeric values are the contract with renderers and exporters; labels and
 * colors below are only the lookup table at that boundary.
 */

// ============================================================================
// CODES
// ============================================================================

export const VertexReason = {
  Kept: 0,
  Curvature: 1,
  Variance: 2,
  Border: 3,
} as const;

export type VertexReason = typeof VertexReason[keyof typeof VertexReason];

export const FaceReason = {
  ...VertexReason,
  Island: 4,
} as const;

export type FaceReason = typeof FaceReason[keyof typeof FaceReason];

export type FaceReasonKey = keyof typeof FaceReason;

/** Keys in code order (index === code) */
export const FACE_REASON_KEYS: readonly FaceReasonKey[] = [
  'Kept',
  'Curvature',
  'Variance',
  'Border',
  'Island',
];

// ============================================================================
// LABELS & COLORS
// ============================================================================

export const REASON_LABELS: Record<FaceReasonKey, string> = {
  Kept: 'Kept',
  Curvature: 'Removed: High Curvature',
  Variance: 'Removed: High Variance',
  Border: 'Removed: Border Region',
  Island: 'Removed: Isolated Island',
};

export const REASON_COLORS: Record<FaceReasonKey, string> = {
  Kept: '#909090',      // Gray
  Curvature: '#e63946', // Red
  Variance: '#f4a261',  // Orange
  Border: '#e9c46a',    // Yellow
  Island: '#457b9d',    // Blue
};

export interface ReasonLegendEntry {
  code: FaceReason;
  key: FaceReasonKey;
  label: string;
  color: string;
}

export function reasonLegend(): ReasonLegendEntry[] {
  return FACE_REASON_KEYS.map((key) => ({
    code: FaceReason[key],
    key,
    label: REASON_LABELS[key],
    color: REASON_COLORS[key],
  }));
}

// ============================================================================
// COUNTS
// ============================================================================

export type ReasonCounts = Record<FaceReasonKey, number>;

/**
 * Count buffer entries per reason code. Codes outside 0..4 are ignored.
 */
export function countReasons(reasons: Uint8Array): ReasonCounts {
  const counts = new Array<number>(FACE_REASON_KEYS.length).fill(0);
  for (let i = 0; i < reasons.length; i++) {
    const code = reasons[i];
    if (code < counts.length) counts[code]++;
  }
  return {
    Kept: counts[FaceReason.Kept],
    Curvature: counts[FaceReason.Curvature],
    Variance: counts[FaceReason.Variance],
    Border: counts[FaceReason.Border],
    Island: counts[FaceReason.Island],
  };
}
