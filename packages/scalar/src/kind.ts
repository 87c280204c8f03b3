import type { PayloadKind } from "@revgrad/core";

export const scalarKind: PayloadKind<number> = {
  name: "number",
  is: (value: unknown): value is number => typeof value === "number",
  zero: () => 0,
  ones: () => 1,
  add: (a, b) => a + b,
};
