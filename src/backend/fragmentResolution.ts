import { defineEnum } from "../utils/enum";

// sizes a WAN fragment can take. value = (shape << 2) | size, as the fragment header stores them;
// shape 0 is square, 1 wide, 2 tall.
export const kFragmentResolution = defineEnum({
  "8x8": { value: 0b0000, width: 8, height: 8 },
  "16x16": { value: 0b0001, width: 16, height: 16 },
  "32x32": { value: 0b0010, width: 32, height: 32 },
  "64x64": { value: 0b0011, width: 64, height: 64 },
  "16x8": { value: 0b0100, width: 16, height: 8 },
  "32x8": { value: 0b0101, width: 32, height: 8 },
  "32x16": { value: 0b0110, width: 32, height: 16 },
  "64x32": { value: 0b0111, width: 64, height: 32 },
  "8x16": { value: 0b1000, width: 8, height: 16 },
  "8x32": { value: 0b1001, width: 8, height: 32 },
  "16x32": { value: 0b1010, width: 16, height: 32 },
  "32x64": { value: 0b1011, width: 32, height: 64 },
} as const);

export type FragmentResolution = typeof kFragmentResolution.$key;

export function fragmentResolutionOf(width: number, height: number): FragmentResolution | undefined {
  return kFragmentResolution.coerceByKey(`${width}x${height}`)?.key;
}

export function describeFragmentResolutions(): string {
  return kFragmentResolution.keys.join(", ");
}
