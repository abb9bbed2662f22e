// =========================================================
// ANALYZE SCRIPT — REVIEW TRADE LOGS AND METRICS
// =========================================================

import * as fs from 'fs';
import * as path from 'path';
import { TradeLogger } from '../logging/tradeLogger';
import { MetricsCalculator } from '../logging/metrics';
import { ENGINE_CONFIG, LOG_CONFIG } from '../config';

/**
 * Analyze trade logs and print metrics
 */
async function analyze(): Promise<void> {
  console.log(`
╔═══════════════════════════════════════════════════════════════╗
║         LAUNCH SIGNAL PIPELINE — LOG ANALYSIS                 ║
╚═══════════════════════════════════════════════════════════════╝
`);

  const logDir = process.argv[2] ?? LOG_CONFIG.dir;

  if (!fs.existsSync(logDir)) {
    console.log('No log directory found. Run the system first to generate trades.');
    return;
  }

  const files = TradeLogger.listLogFiles(logDir);
  if (files.length === 0) {
    console.log('No trade log files found. Run the system first to generate trades.');
    return;
  }

  console.log(`Found ${files.length} log file(s):\n`);
  files.forEach(f => console.log(`  - ${path.basename(f)}`));
  console.log('');

  const calculator = new MetricsCalculator(ENGINE_CONFIG.dryRunBalanceUsd);
  calculator.loadFromLogs(files);

  console.log(calculator.getSummary());

  const allTrades = files.flatMap(f => TradeLogger.readTrades(f));

  if (allTrades.length > 0) {
    console.log('\nMost Recent Trades (last 10):');
    console.log('─────────────────────────────────────────────────────────────────────────────');
    console.log('Token           Chain     Size ($)    P&L ($)    P&L %     Exit Reason');
    console.log('─────────────────────────────────────────────────────────────────────────────');

    const recent = allTrades.slice(-10).reverse();
    for (const trade of recent) {
      const token = (trade.symbol + ' ' + trade.address.slice(0, 8)).padEnd(15);
      const chain = trade.chain.padEnd(9);
      const size = trade.entryAmountUsd.toFixed(2).padStart(8);
      const pnl = ((trade.pnlUsd >= 0 ? '+' : '') + trade.pnlUsd.toFixed(2)).padStart(9);
      const pct = ((trade.pnlPercent >= 0 ? '+' : '') + trade.pnlPercent.toFixed(1) + '%').padStart(8);
      const reason = trade.exitReason ?? 'unknown';

      console.log(`${token} ${chain} ${size}  ${pnl}  ${pct}   ${reason}`);
    }
    console.log('─────────────────────────────────────────────────────────────────────────────\n');

    const sorted = [...allTrades].sort((a, b) => b.pnlUsd - a.pnlUsd);

    console.log('Top 5 Best Trades:');
    sorted.slice(0, 5).forEach((t, i) => {
      console.log(`  ${i + 1}. ${t.address.slice(0, 12)}... P&L: $${t.pnlUsd.toFixed(2)} (${t.exitReason ?? 'unknown'})`);
    });

    console.log('\nTop 5 Worst Trades:');
    sorted.slice(-5).reverse().forEach((t, i) => {
      console.log(`  ${i + 1}. ${t.address.slice(0, 12)}... P&L: $${t.pnlUsd.toFixed(2)} (${t.exitReason ?? 'unknown'})`);
    });
  }
}

analyze().catch(console.error);
