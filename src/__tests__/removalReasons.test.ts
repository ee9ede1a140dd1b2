import { describe, expect, it } from 'vitest';
import { FACE_REASON_KEYS, FaceReason, VertexReason, countReasons } from '../utils/removalReasons';

describe('reason codes', () => {
  it('uses fixed numeric codes', () => {
    expect(VertexReason).toEqual({ Kept: 0, Curvature: 1, Variance: 2, Border: 3 });
    expect(FaceReason.Island).toBe(4);
    FACE_REASON_KEYS.forEach((key, code) => expect(FaceReason[key]).toBe(code));
  });

  it('counts buffer entries per code', () => {
    expect(countReasons(Uint8Array.from([0, 0, 1, 3, 4, 4, 4]))).toEqual({
      Kept: 2,
      Curvature: 1,
      Variance: 0,
      Border: 1,
      Island: 3,
    });
  });
});
