import crypto from 'crypto';
import type { GenerationConfig, GenerationProgress, GenerationSink } from '../types';
import { config } from '../config';
import { buildAlphabet } from '../utils/alphabet';
import { CapacityExceededError } from '../utils/errors';
import { applyGrouping } from '../utils/grouping';
import { PLACEHOLDER, estimateCapacity, isUnbounded, keyspaceLength } from '../utils/keyspace';
import { createChildLogger } from '../utils/logger';
import { validateGenerationConfig } from '../utils/validation';

const log = createChildLogger('keygen');

// Collision advisory kicks in past count * 50 rejections on alphabets this small
const COLLISION_FACTOR = 50;
const SMALL_ALPHABET = 10;

export const COLLISION_ADVISORY = 'Warning: many collisions occurring. Consider increasing length/alphabet.';

export interface KeyGenOptions {
  /** Batches at least this large report progress. */
  progressThreshold: number;
  /** Accepted keys between progress reports. */
  progressInterval: number;
  /** Uniform integer in [0, max); must come from a CSPRNG outside tests. */
  randomIndex: (max: number) => number;
}

/**
 * Fill in defaults for every setting the caller left out.
 */
export function createGenerationConfig(overrides: Partial<GenerationConfig> = {}): GenerationConfig {
  return {
    count: overrides.count ?? config.generation.defaultCount,
    length: overrides.length ?? config.generation.defaultLength,
    pattern: overrides.pattern,
    alphabet: overrides.alphabet,
    avoidAmbiguous: overrides.avoidAmbiguous ?? true,
    unique: overrides.unique ?? true,
    groupSize: overrides.groupSize ?? 0,
    separator: overrides.separator ?? '-',
    uppercase: overrides.uppercase ?? true,
  };
}

export function formatProgress(event: GenerationProgress): string {
  return `[${event.generated}/${event.total}] generated... (${(event.elapsedMs / 1000).toFixed(1)}s)`;
}

const loggingSink: GenerationSink = {
  progress: (event) => log.info(event, formatProgress(event)),
  advisory: (message) => log.warn(message),
};

export class KeyGenService {
  private static instance: KeyGenService;

  private readonly options: KeyGenOptions;

  constructor(options: Partial<KeyGenOptions> = {}) {
    this.options = {
      progressThreshold: options.progressThreshold ?? config.generation.progressThreshold,
      progressInterval: options.progressInterval ?? config.generation.progressInterval,
      randomIndex: options.randomIndex ?? ((max) => crypto.randomInt(max)),
    };
  }

  static getInstance(): KeyGenService {
    if (!KeyGenService.instance) {
      KeyGenService.instance = new KeyGenService();
    }
    return KeyGenService.instance;
  }

  /**
   * Produce one key from an already built alphabet.
   *
   * Pattern mode swaps every placeholder for a random alphabet character
   * and copies the rest. Fixed-length mode draws `length` characters and
   * applies grouping. Upper-casing comes last in both modes.
   */
  generateOne(cfg: GenerationConfig, alphabet: string): string {
    const chars = Array.from(alphabet);
    const draw = (): string => chars[this.options.randomIndex(chars.length)];

    let key: string;
    if (cfg.pattern !== undefined) {
      key = '';
      for (const ch of cfg.pattern) {
        key += ch === PLACEHOLDER ? draw() : ch;
      }
    } else {
      let raw = '';
      for (let i = 0; i < cfg.length; i++) {
        raw += draw();
      }
      key = applyGrouping(raw, cfg.groupSize, cfg.separator);
    }

    return cfg.uppercase ? key.toUpperCase() : key;
  }

  /**
   * Generate exactly `cfg.count` keys in acceptance order.
   *
   * With `unique` set, duplicates are resampled until the batch is full.
   * Progress and the collision advisory go to `sink`, or to the log when
   * no sink is given.
   *
   * @throws InvalidConfigError, InvalidAlphabetError, CapacityExceededError
   */
  generateKeys(cfg: GenerationConfig, sink: GenerationSink = loggingSink): string[] {
    validateGenerationConfig(cfg);
    const alphabet = buildAlphabet(cfg.alphabet, cfg.avoidAmbiguous);
    const chars = Array.from(alphabet);
    const alphabetSize = chars.length;

    // 'a' and 'A' collapse into one output character once upper-cased
    const distinctOutputs = cfg.uppercase ? new Set(chars.map((ch) => ch.toUpperCase())).size : alphabetSize;
    const capacity = estimateCapacity(distinctOutputs, keyspaceLength(cfg));
    if (cfg.unique && !isUnbounded(capacity) && BigInt(cfg.count) > capacity) {
      throw new CapacityExceededError(cfg.count, capacity);
    }

    log.debug({ count: cfg.count, alphabetSize, pattern: cfg.pattern, unique: cfg.unique }, 'Generating keys');

    const keys: string[] = [];
    const seen = new Set<string>();
    const start = Date.now();
    const reportProgress = cfg.count >= this.options.progressThreshold;
    let rejected = 0;
    let warned = false;

    while (keys.length < cfg.count) {
      const key = this.generateOne(cfg, alphabet);

      if (cfg.unique) {
        if (seen.has(key)) {
          rejected++;
          if (!warned && rejected > cfg.count * COLLISION_FACTOR && alphabetSize < SMALL_ALPHABET) {
            warned = true;
            sink.advisory?.(COLLISION_ADVISORY);
          }
          continue;
        }
        seen.add(key);
      }

      keys.push(key);

      if (reportProgress && keys.length % this.options.progressInterval === 0) {
        sink.progress?.({ generated: keys.length, total: cfg.count, elapsedMs: Date.now() - start });
      }
    }

    log.debug({ count: keys.length, rejected, elapsedMs: Date.now() - start }, 'Generation finished');
    return keys;
  }
}
