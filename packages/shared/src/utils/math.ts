export const clamp = (v: number, lo: number, hi: number) => Math.max(lo, Math.min(hi, v));

export function clamp01(x: number) {
  return clamp(x, 0, 1);
}

export const degToRad = (deg: number) => (deg * Math.PI) / 180;
