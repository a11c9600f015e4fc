import axios from 'axios';
import type { AxiosInstance } from 'axios';
import type { Server } from 'http';
import { CycleOrchestrator } from '../src/engine/orchestrator';
import { PaperExecutionAdapter } from '../src/execution/paper';
import { EventBus } from '../src/notifications/eventBus';
import { SqliteStore } from '../src/persistence/sqlite';
import { PositionLedger } from '../src/positions/ledger';
import { RiskGovernor } from '../src/risk/riskGovernor';
import { createServer } from '../src/server';
import { SignalAggregator } from '../src/signals/aggregator';
import { SYMBOL, ScriptedSource, snapshotAt } from './helpers';

describe('http surface', () => {
  let store: SqliteStore;
  let engine: CycleOrchestrator;
  let server: Server;
  let http: AxiosInstance;

  beforeEach(async () => {
    store = new SqliteStore(':memory:');
    const aggregator = new SignalAggregator();
    aggregator.register(new ScriptedSource('scripted'), 0.5);
    engine = new CycleOrchestrator(
      {
        aggregator,
        risk: new RiskGovernor({
          startingCapital: 10000,
          positionSizePercent: 5,
          dailyLossLimitPercent: 15,
          killSwitchPercent: 50,
        }),
        ledger: new PositionLedger(),
        execution: new PaperExecutionAdapter(50000),
        marketData: { fetchSnapshot: async () => snapshotAt(50000) },
        store,
        sink: new EventBus(),
      },
      { symbol: SYMBOL, confidenceThreshold: 70, stopLossPercent: 5, pollIntervalMs: 1000, errorBackoffMs: 1000 },
    );
    server = createServer(engine, store, new EventBus());
    await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
    const address = server.address();
    if (address === null || typeof address === 'string') throw new Error('server is not listening on a port');
    http = axios.create({ baseURL: `http://127.0.0.1:${address.port}`, validateStatus: () => true });
  });

  afterEach(async () => {
    await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
    await store.close();
  });

  it('reports health and status', async () => {
    expect((await http.get('/health')).data).toEqual({ ok: true });
    const status = await http.get('/status');
    expect(status.status).toBe(200);
    expect(status.data.context).toMatchObject({ symbol: SYMBOL, status: 'IDLE', balance: 10000 });
    expect(status.data.strategies).toEqual([{ name: 'scripted', weight: 0.5, enabled: true }]);
  });

  it('lists positions and trades', async () => {
    expect((await http.get('/positions')).data).toEqual({ rows: [] });
    expect((await http.get('/trades?limit=5')).data).toEqual({ rows: [] });
  });

  it('queues pause until the next cycle', async () => {
    const res = await http.post('/control/pause');
    expect(res.status).toBe(202);
    expect(res.data).toEqual({ accepted: 'pause' });
    await engine.runCycle();
    expect(engine.status().context.paused).toBe(true);
  });

  it('updates strategies', async () => {
    const res = await http.post('/strategies/scripted', { weight: 0.4, enabled: false });
    expect(res.status).toBe(200);
    expect(res.data).toEqual({ name: 'scripted', weight: 0.4, enabled: false });
  });

  it('rejects bad requests', async () => {
    expect((await http.post('/strategies/scripted', { weight: 2 })).status).toBe(400);
    expect((await http.post('/strategies/unknown', { weight: 0.1 })).status).toBe(404);
    expect((await http.post('/control/explode')).status).toBe(404);
    expect((await http.get('/nowhere')).status).toBe(404);
  });
});
