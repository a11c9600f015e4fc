import { createLogger } from '../logger';
import { NotFoundError, errorMessage } from '../errors';
import { createSignal, hold } from './types';
import type { MarketSnapshot, Signal, SignalDirection, SignalSource, WeightedOpinion } from './types';

const logger = createLogger('signal-aggregator');

export const NO_ACTIVE_SOURCES = 'no active sources';

interface RegistryEntry {
  source: SignalSource;
  weight: number;
  enabled: boolean;
}

export interface SourceInfo {
  name: string;
  weight: number;
  enabled: boolean;
}

function assertWeight(weight: number): void {
  if (!Number.isFinite(weight) || weight < 0 || weight > 1) {
    throw new RangeError(`Weight must be between 0 and 1, got ${weight}`);
  }
}

/**
 * Weighted vote across every enabled opinion.
 *
 * The winning bucket must be strictly larger than both others; any tie at the top
 * resolves to HOLD. A non-HOLD winner below `confidenceThreshold` is downgraded to HOLD
 * but keeps its score as the confidence.
 */
export function combine(opinions: WeightedOpinion[], confidenceThreshold: number): Signal {
  const active = opinions.filter((o) => o.enabled);
  if (active.length === 0) return hold(NO_ACTIVE_SOURCES);

  const scores: Record<SignalDirection, number> = { BUY: 0, SELL: 0, HOLD: 0 };
  const parts: string[] = [];
  for (const o of active) {
    scores[o.signal.direction] += o.signal.confidence * o.weight;
    parts.push(`${o.sourceName}: ${o.signal.rationale}`);
  }

  let direction: SignalDirection = 'HOLD';
  let score = scores.HOLD;
  if (scores.BUY > scores.SELL && scores.BUY > scores.HOLD) {
    direction = 'BUY';
    score = scores.BUY;
  } else if (scores.SELL > scores.BUY && scores.SELL > scores.HOLD) {
    direction = 'SELL';
    score = scores.SELL;
  } else if (!(scores.HOLD > scores.BUY && scores.HOLD > scores.SELL)) {
    // tie at the top
    score = Math.max(scores.BUY, scores.SELL, scores.HOLD);
  }

  if (direction !== 'HOLD' && score < confidenceThreshold) {
    parts.push(`${direction} downgraded to HOLD: confidence ${score.toFixed(1)} below threshold ${confidenceThreshold}`);
    direction = 'HOLD';
  }

  return createSignal(direction, Math.min(score, 100), parts.join(' | '));
}

export class SignalAggregator {
  private readonly entries: RegistryEntry[] = [];

  register(source: SignalSource, weight = 1, enabled = true): void {
    assertWeight(weight);
    if (this.entries.some((e) => e.source.name === source.name)) {
      throw new RangeError(`Signal source already registered: ${source.name}`);
    }
    this.entries.push({ source, weight, enabled });
  }

  unregister(name: string): void {
    const idx = this.entries.findIndex((e) => e.source.name === name);
    if (idx === -1) throw new NotFoundError(`Unknown signal source: ${name}`);
    this.entries.splice(idx, 1);
  }

  get(name: string): SignalSource {
    return this.entry(name).source;
  }

  setWeight(name: string, weight: number): void {
    assertWeight(weight);
    this.entry(name).weight = weight;
  }

  enable(name: string): void {
    this.entry(name).enabled = true;
  }

  disable(name: string): void {
    this.entry(name).enabled = false;
  }

  sources(): SourceInfo[] {
    return this.entries.map((e) => ({ name: e.source.name, weight: e.weight, enabled: e.enabled }));
  }

  /**
   * Evaluates every enabled source against the snapshot. Weight and enabled flag are read
   * once, before any source runs. A source that throws or returns a malformed signal drops out for this cycle only.
   */
  async collect(snapshot: MarketSnapshot): Promise<WeightedOpinion[]> {
    const active = this.entries.filter((e) => e.enabled).map((e) => ({ ...e }));
    const results = await Promise.all(
      active.map(async (e): Promise<WeightedOpinion | null> => {
        try {
          const raw = await e.source.evaluate(snapshot);
          const signal = createSignal(raw.direction, raw.confidence, raw.rationale);
          logger.info(
            { source: e.source.name, direction: signal.direction, confidence: signal.confidence },
            'source opinion',
          );
          return { sourceName: e.source.name, weight: e.weight, signal, enabled: true };
        } catch (err) {
          logger.warn({ source: e.source.name, err: errorMessage(err) }, 'signal source failed; skipped this cycle');
          return null;
        }
      }),
    );
    return results.filter((r): r is WeightedOpinion => r !== null);
  }

  async decide(snapshot: MarketSnapshot, confidenceThreshold: number): Promise<Signal> {
    return combine(await this.collect(snapshot), confidenceThreshold);
  }

  private entry(name: string): RegistryEntry {
    const found = this.entries.find((e) => e.source.name === name);
    if (!found) throw new NotFoundError(`Unknown signal source: ${name}`);
    return found;
  }
}
