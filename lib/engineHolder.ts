/**
 * Holds the current compiled engine for long-running callers. reload() builds a
 * complete replacement first and swaps the reference in one assignment, so a reader
 * sees either the old rule set or the new one, never a mix.
 */

import { compileEngine, type CompiledEngine } from "./classifyNews";
import type { EngineConfig } from "./engineConfig";
import type { FallbackRule } from "./primarySelector";
import { createLogger } from "./logger";

const log = createLogger("engine");

export type EngineConfigSource = () => EngineConfig;

export class EngineHolder {
  private engine: CompiledEngine;
  private generation = 1;

  constructor(
    private readonly source: EngineConfigSource,
    private readonly fallbackRules?: readonly FallbackRule[]
  ) {
    this.engine = compileEngine(source(), fallbackRules);
  }

  current(): CompiledEngine {
    return this.engine;
  }

  get version(): number {
    return this.generation;
  }

  /**
   * Rebuild from the source. On failure the previous engine stays in place and the
   * error is returned to the caller.
   */
  reload(): { ok: true; version: number } | { ok: false; error: unknown } {
    let next: CompiledEngine;
    try {
      next = compileEngine(this.source(), this.fallbackRules);
    } catch (error) {
      log.error("engine reload failed; keeping previous config", { version: this.generation, error: String(error) });
      return { ok: false, error };
    }
    this.engine = next;
    this.generation += 1;
    log.info("engine reloaded", {
      version: this.generation,
      entities: next.config.entities.length,
      categories: next.config.categories.length,
    });
    return { ok: true, version: this.generation };
  }
}
