/**
 * Subsystem interfaces (ports).
 */
import { Context } from "effect";
import type { AutodiffConfig } from "./types.js";

// ── Ids ────────────────────────────────────────────────────────────────────
export interface IdAllocator {
  next(): number;
}

// ── Config ─────────────────────────────────────────────────────────────────
export class AutodiffConfigService extends Context.Tag("AutodiffConfigService")<
  AutodiffConfigService,
  AutodiffConfig
>() {}
