import { EngineStateError, errorMessage } from '../errors';
import type { ExecutionAdapter } from '../execution/types';
import { createLogger } from '../logger';
import type { MarketDataProvider } from '../marketData';
import type { NotificationSink } from '../notifications/eventBus';
import type { TradeStore } from '../persistence/types';
import type { Position, PositionLedger } from '../positions/ledger';
import type { RiskGovernor } from '../risk/riskGovernor';
import { utcDate } from '../risk/riskGovernor';
import type { SignalAggregator } from '../signals/aggregator';
import type { MarketSnapshot, Signal } from '../signals/types';
import { sleep as defaultSleep } from './scheduler';
import type { Sleeper } from './scheduler';
import type { EngineContext, EngineStatusSnapshot, Trade } from './types';

const logger = createLogger('orchestrator');

export interface OrchestratorDeps {
  aggregator: SignalAggregator;
  risk: RiskGovernor;
  ledger: PositionLedger;
  execution: ExecutionAdapter;
  marketData: MarketDataProvider;
  store: TradeStore;
  sink: NotificationSink;
}

export interface OrchestratorOptions {
  symbol: string;
  confidenceThreshold: number;
  stopLossPercent: number;
  pollIntervalMs: number;
  errorBackoffMs: number;
  /** Current UTC date, YYYY-MM-DD. */
  today?: () => string;
  now?: () => number;
  sleep?: Sleeper;
}

export type CycleAction = 'BUY' | 'SELL' | 'NONE';

export interface CycleReport {
  cycle: number;
  price: number;
  signal: Signal | null;
  action: CycleAction;
  /** Why an actionable signal was not traded. */
  rejection: string | null;
  stopLossCloses: number;
  halted: boolean;
}

interface PendingCommands {
  pause: boolean | null;
  closeAll: boolean;
  resetKillSwitch: boolean;
}

/**
 * Drives the fetch, evaluate, gate, execute, record loop for one symbol.
 *
 * All engine state lives in one EngineContext written only from inside a cycle.
 * Operator commands are queued and applied at the next cycle boundary.
 */
export class CycleOrchestrator {
  private readonly deps: OrchestratorDeps;
  private readonly opts: Required<OrchestratorOptions>;
  private readonly ctx: EngineContext;
  private pending: PendingCommands = { pause: null, closeAll: false, resetKillSwitch: false };
  private inFlight = false;
  private abort: AbortController | null = null;
  private loop: Promise<void> | null = null;

  constructor(deps: OrchestratorDeps, opts: OrchestratorOptions) {
    if (!(opts.stopLossPercent > 0 && opts.stopLossPercent < 100)) {
      throw new RangeError(`stopLossPercent must be in (0, 100), got ${opts.stopLossPercent}`);
    }
    this.deps = deps;
    this.opts = {
      today: () => utcDate(),
      now: Date.now,
      sleep: defaultSleep,
      ...opts,
    };
    this.ctx = {
      symbol: opts.symbol,
      balance: deps.risk.config.startingCapital,
      realizedPnlTotal: 0,
      status: 'IDLE',
      paused: false,
      cycle: 0,
      lastSignal: null,
      lastPrice: null,
      lastCycleAt: null,
      lastError: null,
    };
  }

  get running(): boolean {
    return this.loop !== null;
  }

  /** Rehydrates balance, risk state and open positions from the store. */
  async restore(): Promise<void> {
    const { store, risk, ledger } = this.deps;
    const [positions, riskState, engineState] = await Promise.all([
      store.loadOpenPositions(),
      store.loadRiskState(),
      store.loadEngineState(),
    ]);
    if (riskState) risk.restore(riskState);
    if (engineState) {
      this.ctx.balance = engineState.balance;
      this.ctx.realizedPnlTotal = engineState.realizedPnlTotal;
      this.ctx.paused = engineState.paused;
    }
    ledger.hydrate(positions);
    // Latched with positions still open: liquidation is unfinished and stays runnable.
    if (this.liquidated()) this.ctx.status = 'HALTED';
    logger.info(
      { balance: this.ctx.balance, openPositions: positions.length, locked: risk.locked, paused: this.ctx.paused },
      'engine state restored',
    );
  }

  /** Runs cycles until stopped or halted. Resolves when the loop exits. */
  start(): Promise<void> {
    if (this.loop) return this.loop;
    if (this.liquidated()) {
      this.ctx.status = 'HALTED';
      logger.error('refusing to start: kill switch is engaged');
      this.publishStatus('kill switch engaged');
      return Promise.resolve();
    }
    const abort = new AbortController();
    this.abort = abort;
    this.ctx.status = 'RUNNING';
    this.publishStatus();
    logger.info(
      { symbol: this.ctx.symbol, mode: this.deps.execution.mode, pollIntervalMs: this.opts.pollIntervalMs },
      'engine started',
    );
    this.loop = this.runLoop(abort.signal).finally(() => {
      this.loop = null;
      this.abort = null;
    });
    return this.loop;
  }

  /** Requests a stop. An in-flight cycle finishes first. */
  stop(): void {
    this.abort?.abort();
  }

  pause(): void {
    this.pending.pause = true;
  }

  resume(): void {
    this.pending.pause = false;
  }

  /** Closes every open position at the next cycle boundary and pauses new entries. */
  closeAll(): void {
    this.pending.closeAll = true;
  }

  /** Clears a latched kill switch. Applied immediately when no cycle is running. */
  async resetKillSwitch(): Promise<void> {
    if (this.inFlight) {
      this.pending.resetKillSwitch = true;
      return;
    }
    await this.applyKillSwitchReset();
  }

  setStrategyWeight(name: string, weight: number): void {
    this.deps.aggregator.setWeight(name, weight);
    logger.info({ strategy: name, weight }, 'strategy weight updated');
  }

  enableStrategy(name: string): void {
    this.deps.aggregator.enable(name);
    logger.info({ strategy: name }, 'strategy enabled');
  }

  disableStrategy(name: string): void {
    this.deps.aggregator.disable(name);
    logger.info({ strategy: name }, 'strategy disabled');
  }

  status(): EngineStatusSnapshot {
    return {
      context: Object.freeze({ ...this.ctx }),
      risk: this.deps.risk.snapshot(),
      openPositions: this.deps.ledger.openPositions().map((p) => ({ ...p })),
      strategies: this.deps.aggregator.sources(),
      equity: this.equity(),
    };
  }

  /** One full pass. Throws EngineStateError when a cycle is already running or the engine is halted. */
  async runCycle(): Promise<CycleReport> {
    if (this.inFlight) throw new EngineStateError('cycle already in progress');
    if (this.ctx.status === 'HALTED') throw new EngineStateError('engine halted by kill switch');
    this.inFlight = true;
    try {
      return await this.cycle();
    } finally {
      this.inFlight = false;
    }
  }

  private async runLoop(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      let delay = this.opts.pollIntervalMs;
      try {
        const report = await this.runCycle();
        this.ctx.lastError = null;
        if (report.halted) return;
      } catch (err) {
        this.ctx.lastError = errorMessage(err);
        logger.error({ err, cycle: this.ctx.cycle }, 'cycle failed, backing off');
        delay = this.opts.errorBackoffMs;
      }
      await this.opts.sleep(delay, signal);
    }
    this.ctx.status = 'STOPPED';
    await this.persistEngine();
    this.publishStatus('stopped');
    logger.info({ cycles: this.ctx.cycle }, 'engine stopped');
  }

  private async cycle(): Promise<CycleReport> {
    const { risk, ledger, execution, marketData, aggregator, store, sink } = this.deps;
    const { symbol } = this.ctx;
    this.ctx.cycle += 1;
    const report: CycleReport = {
      cycle: this.ctx.cycle,
      price: 0,
      signal: null,
      action: 'NONE',
      rejection: null,
      stopLossCloses: 0,
      halted: false,
    };

    await this.applyPending();
    risk.rolloverIfNewDay(this.opts.today());

    const snapshot = await marketData.fetchSnapshot(symbol);
    const { price } = snapshot;
    report.price = price;
    this.ctx.lastPrice = price;
    this.ctx.lastCycleAt = this.opts.now();
    execution.observePrice(symbol, price);

    for (const p of ledger.openPositions()) {
      if (p.symbol !== symbol) continue;
      ledger.revalue(p, price);
      await store.savePosition(p);
      sink.publish({ type: 'position_update', data: { ...p } });
    }

    for (const p of ledger.checkStopLossBreaches({ [symbol]: price })) {
      logger.warn({ positionId: p.id, price, stopLossPrice: p.stopLossPrice }, 'stop-loss breached');
      await this.closePosition(p, `stop-loss triggered at ${price}`, null);
      report.stopLossCloses += 1;
    }

    if (this.pending.closeAll) {
      this.pending.closeAll = false;
      for (const p of ledger.openPositions()) await this.closePosition(p, 'closed by operator', null);
      this.ctx.paused = true;
      this.publishStatus('close-all');
    }

    if (risk.checkKillSwitch(this.totalLossPercent())) {
      await this.halt();
      report.halted = true;
      return report;
    }

    if (this.ctx.paused) {
      await this.persistState();
      return report;
    }

    const signal = await aggregator.decide(snapshot, this.opts.confidenceThreshold);
    report.signal = signal;
    this.ctx.lastSignal = signal;
    sink.publish({ type: 'signal', data: signal });
    logger.info({ cycle: this.ctx.cycle, price, direction: signal.direction, confidence: signal.confidence }, 'signal');

    const verdict = risk.validate(this.ctx.balance, risk.dailyLossPercent);
    const open = ledger.openFor(symbol);
    if (signal.direction === 'BUY' && !open) {
      if (verdict.approved) {
        await this.openLong(snapshot, signal);
        report.action = 'BUY';
      } else {
        report.rejection = verdict.reason;
      }
    } else if (signal.direction === 'SELL' && open) {
      if (verdict.approved) {
        await this.closePosition(open, signal.rationale, signal);
        report.action = 'SELL';
      } else {
        report.rejection = verdict.reason;
      }
    }
    if (report.rejection) logger.info({ reason: report.rejection, direction: signal.direction }, 'trade rejected');

    await this.persistState();
    return report;
  }

  private async openLong(snapshot: MarketSnapshot, signal: Signal): Promise<void> {
    const { risk, ledger, execution, store, sink } = this.deps;
    const { symbol } = snapshot;
    const size = risk.sizePosition(this.ctx.balance);
    const order = await execution.buy(symbol, size / snapshot.price);
    const stopLossPrice = order.fillPrice * (1 - this.opts.stopLossPercent / 100);
    const position = ledger.open(symbol, order.fillPrice, order.amount, stopLossPrice);
    this.ctx.balance -= order.fillPrice * order.amount;

    const trade: Trade = {
      symbol,
      side: 'BUY',
      amount: order.amount,
      entryPrice: order.fillPrice,
      exitPrice: null,
      realizedPnl: null,
      signalSnapshot: signal,
      rationale: signal.rationale,
      orderId: order.id,
      simulated: order.simulated,
      positionId: position.id,
      timestamp: this.opts.now(),
    };
    await store.savePosition(position);
    await store.saveTrade(trade);
    await this.persistEngine();
    sink.publish({ type: 'trade_executed', data: trade });
    sink.publish({ type: 'position_update', data: { ...position } });
    logger.info(
      { positionId: position.id, amount: order.amount, price: order.fillPrice, stopLossPrice },
      'position opened',
    );

    try {
      await execution.placeStopLoss(symbol, order.amount, stopLossPrice);
    } catch (err) {
      // the ledger stop-loss check still covers the position
      logger.warn({ err, positionId: position.id, stopLossPrice }, 'venue stop-loss order failed');
    }
  }

  private async closePosition(position: Position, rationale: string, signal: Signal | null): Promise<number> {
    const { risk, ledger, execution, store, sink } = this.deps;
    const order = await execution.sell(position.symbol, position.amount);
    const realized = ledger.close(position, order.fillPrice);
    this.ctx.balance += order.fillPrice * position.amount;
    this.ctx.realizedPnlTotal += realized;
    risk.recordRealizedPnl(realized);

    const trade: Trade = {
      symbol: position.symbol,
      side: 'SELL',
      amount: position.amount,
      entryPrice: position.entryPrice,
      exitPrice: order.fillPrice,
      realizedPnl: realized,
      signalSnapshot: signal,
      rationale,
      orderId: order.id,
      simulated: order.simulated,
      positionId: position.id,
      timestamp: this.opts.now(),
    };
    await store.savePosition(position);
    await store.saveTrade(trade);
    await this.persistEngine();
    sink.publish({ type: 'trade_executed', data: trade });
    sink.publish({ type: 'position_update', data: { ...position } });
    logger.info({ positionId: position.id, exitPrice: order.fillPrice, realized, rationale }, 'position closed');
    return realized;
  }

  /** Closes every open position, then halts. A failed close leaves the engine running so the next cycle retries. */
  private async halt(): Promise<void> {
    const { ledger, risk, sink } = this.deps;
    for (const p of ledger.openPositions()) {
      try {
        await this.closePosition(p, 'kill switch liquidation', null);
      } catch (err) {
        logger.error(
          { err, positionId: p.id, open: ledger.openPositions().length },
          'kill switch liquidation incomplete; retrying next cycle',
        );
        await this.persistState();
        throw err;
      }
    }
    this.ctx.status = 'HALTED';
    this.abort?.abort();
    await this.persistState();
    const riskState = risk.snapshot();
    sink.publish({ type: 'kill_switch', data: { risk: riskState, context: { ...this.ctx } } });
    this.publishStatus('kill switch');
    logger.fatal(
      { totalLossPercent: riskState.totalLossPercent, balance: this.ctx.balance },
      'KILL SWITCH ACTIVATED: trading halted until manual reset',
    );
  }

  private async applyPending(): Promise<void> {
    if (this.pending.resetKillSwitch) {
      this.pending.resetKillSwitch = false;
      await this.applyKillSwitchReset();
    }
    if (this.pending.pause !== null && this.pending.pause !== this.ctx.paused) {
      this.ctx.paused = this.pending.pause;
      logger.info({ paused: this.ctx.paused }, this.ctx.paused ? 'trading paused' : 'trading resumed');
      this.publishStatus(this.ctx.paused ? 'paused' : 'resumed');
    }
    this.pending.pause = null;
  }

  private async applyKillSwitchReset(): Promise<void> {
    this.deps.risk.resetKillSwitch();
    if (this.ctx.status === 'HALTED') this.ctx.status = 'STOPPED';
    await this.persistState();
    this.publishStatus('kill switch reset');
  }

  private liquidated(): boolean {
    return this.deps.risk.locked && this.deps.ledger.openPositions().length === 0;
  }

  private equity(): number {
    return this.ctx.balance + this.deps.ledger.marketValue();
  }

  private totalLossPercent(): number {
    const start = this.deps.risk.config.startingCapital;
    return (Math.max(0, start - this.equity()) / start) * 100;
  }

  private async persistEngine(): Promise<void> {
    await this.deps.store.saveEngineState({
      balance: this.ctx.balance,
      realizedPnlTotal: this.ctx.realizedPnlTotal,
      status: this.ctx.status,
      paused: this.ctx.paused,
    });
  }

  private async persistState(): Promise<void> {
    await this.deps.store.saveRiskState(this.deps.risk.snapshot());
    await this.persistEngine();
  }

  private publishStatus(reason?: string): void {
    this.deps.sink.publish({
      type: 'system_status',
      data: { status: this.ctx.status, paused: this.ctx.paused, reason },
    });
  }
}
