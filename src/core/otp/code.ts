/** Reduce a truncated value to `digits` decimal digits, left-zero padded */
export const formatCode = (bin: number, digits: number): string =>
  String(bin % 10 ** digits).padStart(digits, "0");
