import { createLogger } from '../logger';
import { ConfigError } from '../errors';

const logger = createLogger('risk-governor');

/** Smallest position, in quote currency, worth opening. */
export const MIN_POSITION_USD = 10;

export interface RiskConfig {
  startingCapital: number;
  positionSizePercent: number;
  dailyLossLimitPercent: number;
  killSwitchPercent: number;
}

export interface RiskState {
  startingCapital: number;
  dailyRealizedPnl: number;
  dailyLossPercent: number;
  totalLossPercent: number;
  locked: boolean;
  lockedAt: number | null;
  /** UTC date, YYYY-MM-DD */
  dailyAnchorDate: string;
}

export type Validation = { approved: true; reason: string } | { approved: false; reason: string };

export const REJECT_LOCKED = 'trading locked by kill switch';
export const REJECT_INSUFFICIENT_BALANCE = 'insufficient balance for minimum position size';

export function utcDate(at: Date = new Date()): string {
  return at.toISOString().slice(0, 10);
}

function assertPercent(name: string, v: number): void {
  if (!Number.isFinite(v) || v <= 0 || v > 100) {
    throw new ConfigError(`${name} must be in (0, 100], got ${v}`);
  }
}

/**
 * Capital-preservation gate. The only writer of RiskState.
 *
 * The daily limit heals itself on the next UTC day; the kill switch latches until
 * `resetKillSwitch()` is called.
 */
export class RiskGovernor {
  private readonly cfg: RiskConfig;
  private state: RiskState;

  constructor(cfg: RiskConfig, opts: { today?: string } = {}) {
    if (!Number.isFinite(cfg.startingCapital) || cfg.startingCapital <= 0) {
      throw new ConfigError(`startingCapital must be positive, got ${cfg.startingCapital}`);
    }
    assertPercent('positionSizePercent', cfg.positionSizePercent);
    assertPercent('dailyLossLimitPercent', cfg.dailyLossLimitPercent);
    assertPercent('killSwitchPercent', cfg.killSwitchPercent);
    this.cfg = { ...cfg };
    this.state = {
      startingCapital: cfg.startingCapital,
      dailyRealizedPnl: 0,
      dailyLossPercent: 0,
      totalLossPercent: 0,
      locked: false,
      lockedAt: null,
      dailyAnchorDate: opts.today ?? utcDate(),
    };
  }

  get config(): Readonly<RiskConfig> {
    return this.cfg;
  }

  get locked(): boolean {
    return this.state.locked;
  }

  get dailyLossPercent(): number {
    return this.state.dailyLossPercent;
  }

  snapshot(): Readonly<RiskState> {
    return Object.freeze({ ...this.state });
  }

  /** Rehydrate persisted state. The configured starting capital wins over the stored one. */
  restore(saved: RiskState): void {
    this.state = { ...saved, startingCapital: this.cfg.startingCapital };
    if (saved.locked) logger.warn({ lockedAt: saved.lockedAt }, 'restored with kill switch engaged');
  }

  sizePosition(balance: number): number {
    return (balance * this.cfg.positionSizePercent) / 100;
  }

  validate(balance: number, dailyLossPercent: number): Validation {
    if (this.state.locked) return { approved: false, reason: REJECT_LOCKED };
    if (dailyLossPercent >= this.cfg.dailyLossLimitPercent) {
      return { approved: false, reason: `daily loss limit reached (${dailyLossPercent.toFixed(2)}%)` };
    }
    if (this.sizePosition(balance) < MIN_POSITION_USD) {
      return { approved: false, reason: REJECT_INSUFFICIENT_BALANCE };
    }
    return { approved: true, reason: 'trade validated' };
  }

  checkKillSwitch(totalLossPercent: number): boolean {
    if (Number.isFinite(totalLossPercent)) this.state.totalLossPercent = totalLossPercent;
    if (this.state.locked) return true;
    if (totalLossPercent >= this.cfg.killSwitchPercent) {
      this.state.locked = true;
      this.state.lockedAt = Date.now();
      return true;
    }
    return false;
  }

  resetKillSwitch(): void {
    if (!this.state.locked) return;
    this.state.locked = false;
    this.state.lockedAt = null;
    logger.warn({ totalLossPercent: this.state.totalLossPercent }, 'kill switch reset by operator');
  }

  rolloverIfNewDay(today: string = utcDate()): boolean {
    if (today === this.state.dailyAnchorDate) return false;
    logger.info({ from: this.state.dailyAnchorDate, to: today }, 'daily loss window rolled over');
    this.state.dailyAnchorDate = today;
    this.state.dailyRealizedPnl = 0;
    this.state.dailyLossPercent = 0;
    return true;
  }

  recordRealizedPnl(pnl: number): void {
    this.state.dailyRealizedPnl += pnl;
    this.state.dailyLossPercent = (Math.max(0, -this.state.dailyRealizedPnl) / this.cfg.startingCapital) * 100;
  }
}
