import 'dotenv/config';
import { loadConfig } from '../config';
import { SqliteStore } from '../persistence/sqlite';
import { utcDate } from '../risk/riskGovernor';

async function main(): Promise<void> {
  const cfg = loadConfig();
  const store = new SqliteStore(cfg.DB_PATH);
  try {
    const rows = await store.recentTrades(Number(process.argv[2] ?? 20));
    if (!rows.length) {
      console.log('No trades yet. Run a tick first.');
      return;
    }
    console.table(
      rows.map((t) => ({
        Time: new Date(t.timestamp).toISOString(),
        Side: t.side,
        Amount: t.amount,
        Entry: t.entryPrice.toFixed(2),
        Exit: t.exitPrice?.toFixed(2) ?? '',
        PnL: t.realizedPnl?.toFixed(2) ?? '',
        Paper: t.simulated,
      })),
    );
    const today = await store.dailyStats(utcDate());
    if (today) console.log(`Today: ${today.totalTrades} trades, ${today.winningTrades} wins, P&L ${today.totalPnl.toFixed(2)}`);
  } finally {
    await store.close();
  }
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
