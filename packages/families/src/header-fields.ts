export type FieldWidth = "u8" | "u16" | "u32" | "i32";

const LIMITS: Record<FieldWidth, readonly [number, number]> = {
  u8: [0, 0xff],
  u16: [0, 0xffff],
  u32: [0, 0xffffffff],
  i32: [-0x80000000, 0x7fffffff],
};

/**
 * First header field whose value does not fit its wire width, as a reason
 * string for FixedHeaderCodec.check
 */
export function checkHeaderFields(
  family: string,
  fields: readonly (readonly [name: string, value: number, width: FieldWidth])[]
): string | undefined {
  for (const [name, value, width] of fields) {
    const [min, max] = LIMITS[width];
    if (!Number.isInteger(value) || value < min || value > max) {
      return `${family} header field ${name} = ${value} does not fit in ${width}`;
    }
  }
  return undefined;
}
