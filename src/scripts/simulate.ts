// =========================================================
// SIMULATION SCRIPT — TEST WITH SYNTHETIC CHATTER
// =========================================================

import * as crypto from 'crypto';
import bs58 from 'bs58';
import { RawMessage } from '../types';
import { createPipeline } from '../pipeline';
import { SimulatedAuditProviders, DryRunGateway } from '../data/dryRun';
import { SilentNotifier } from '../notify';
import { calculateHype } from '../core/scoring';

type Pattern = 'evm_call' | 'sol_call' | 'noise' | 'hype_only' | 'repeat';

const MONITOR_TICKS = 30;

function randomEvmAddress(): string {
  return `0x${crypto.randomBytes(20).toString('hex')}`;
}

function randomSolanaAddress(): string {
  return bs58.encode(crypto.randomBytes(32));
}

/**
 * Generate a synthetic chatter message for a pattern
 */
function generateMessage(pattern: Pattern, index: number, previous?: RawMessage): RawMessage {
  const id = `sim_${index}`;
  switch (pattern) {
    case 'evm_call':
      return {
        id,
        platform: 'telegram',
        channel: 'alpha_calls',
        text: `🚀🚀 STEALTH LAUNCH just went live!!! CA: ${randomEvmAddress()} 100x gem, buy now`,
      };
    case 'sol_call':
      return {
        id,
        platform: 'discord',
        channel: 'degen-room',
        text: `fair launch on sol, contract ${randomSolanaAddress()} moon incoming 🔥`,
      };
    case 'hype_only':
      return {
        id,
        platform: 'twitter',
        channel: 'timeline',
        text: 'PRESALE ALPHA CALL!!! stealth launch, fair launch, 1000x gem, moon 🚀🚀🚀',
      };
    case 'repeat':
      return previous ? { ...previous } : { id, text: '' };
    case 'noise':
      return { id, platform: 'telegram', channel: 'general', text: 'anyone around? quiet day' };
  }
}

/**
 * Run simulation
 */
async function simulate(): Promise<void> {
  console.log(`
╔═══════════════════════════════════════════════════════════════╗
║         LAUNCH SIGNAL PIPELINE — SIMULATION MODE              ║
╚═══════════════════════════════════════════════════════════════╝
`);

  const pipeline = createPipeline({
    providers: new SimulatedAuditProviders(0.7),
    gateway: new DryRunGateway(),
    notifier: new SilentNotifier(),
    tradeLogDir: null,
  });
  const { detector, orchestrator, engine, metrics } = pipeline;

  const patterns: Pattern[] = [
    'evm_call', 'sol_call', 'noise', 'hype_only', 'repeat',
    'evm_call', 'evm_call', 'sol_call', 'noise', 'evm_call',
  ];

  console.log('Processing synthetic chatter...\n');
  console.log('Msg      Pattern     Hype  Result');
  console.log('─────────────────────────────────────────────────────────────');

  let previous: RawMessage | undefined;
  patterns.forEach((pattern, index) => {
    const message = generateMessage(pattern, index, previous);
    previous = message;
    const signal = detector.ingest(message);
    const hype = calculateHype(message.text ?? '').total;

    let result = 'no signal';
    if (signal) {
      result = signal.address ? `signal ${signal.chain} ${signal.address.slice(0, 10)}...` : 'signal (no address)';
    } else if (pattern === 'repeat') {
      result = 'duplicate id ignored';
    }

    console.log(`${message.id?.padEnd(8) ?? 'n/a     '} ${pattern.padEnd(11)} ${String(hype).padStart(4)}  ${result}`);
  });

  console.log('─────────────────────────────────────────────────────────────\n');

  const handled = await orchestrator.processSignals();
  console.log(`Signals acted on: ${handled}`);
  for (const rejection of orchestrator.getRejections()) {
    const reasons = rejection.failedChecks.map(c => c.name).join(', ');
    console.log(`  rejected ${rejection.address.slice(0, 10)}... score ${rejection.safetyScore.toFixed(1)} (${reasons})`);
  }

  for (let tick = 0; tick < MONITOR_TICKS && engine.getOpenPositions().length > 0; tick++) {
    await orchestrator.monitorPositions();
  }

  const closed = await engine.closeAll('MANUAL');
  const stats = orchestrator.getPipelineStats();

  console.log('\nSimulation Summary:');
  console.log(`  Messages ingested:  ${patterns.length}`);
  console.log(`  Signals detected:   ${stats.signalsDetected}`);
  console.log(`  Passed audit:       ${stats.passedAudit}`);
  console.log(`  Rejected by audit:  ${stats.rejectedAudit}`);
  console.log(`  Trades executed:    ${stats.tradesExecuted}`);
  console.log(`  Closed at end:      ${closed.length}`);
  console.log('');
  console.log(metrics.getSummary());

  detector.stop();
}

simulate().catch(console.error);
