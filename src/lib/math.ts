export const clamp = (value: number, min: number, max: number): number => {
  return Math.max(min, Math.min(max, value));
};

export const lerp = (a: number, b: number, t: number): number => {
  return a + (b - a) * t;
};

export const mapRange = (
  value: number,
  fromMin: number,
  fromMax: number,
  toMin: number,
  toMax: number
): number => {
  if (fromMax === fromMin) {
    return toMin;
  }
  return lerp(toMin, toMax, (value - fromMin) / (fromMax - fromMin));
};
