// =========================================================
// STATUS SERVER — READ-ONLY PIPELINE SNAPSHOTS
// =========================================================

import * as http from 'http';
import { PerformanceMetrics, Position, Rejection, Signal } from '../types';
import { SERVER_CONFIG } from '../config';
import { OrchestratorStatus } from '../core/orchestrator';
import { logger } from '../utils/logger';

const log = logger.child('server');

interface HealthStatus {
  status: 'healthy' | 'unhealthy';
  uptime: number;
  timestamp: string;
}

/**
 * Snapshot sources. Each returns copies; the server never mutates them.
 */
export interface StatusProviders {
  status: () => OrchestratorStatus;
  signals: (limit: number) => Signal[];
  positions: () => { open: Position[]; closed: Position[] };
  rejections: () => Rejection[];
  performance: () => PerformanceMetrics;
}

function metric(name: string, help: string, type: 'counter' | 'gauge', value: number): string {
  return `# HELP ${name} ${help}\n# TYPE ${name} ${type}\n${name} ${value}\n`;
}

/**
 * Prometheus text exposition for the current pipeline state
 */
export function buildMetricsText(uptimeSeconds: number, heapUsedBytes: number, status?: OrchestratorStatus): string {
  const blocks = [
    metric('process_uptime_seconds', 'Process uptime in seconds', 'gauge', uptimeSeconds),
    metric('process_memory_heap_bytes', 'Process heap memory in bytes', 'gauge', heapUsedBytes),
  ];

  if (status) {
    const { pipeline, engine, auditor, detector } = status;
    blocks.push(
      metric('pipeline_messages_processed_total', 'Chatter messages scored', 'counter', detector.messagesProcessed),
      metric('pipeline_signals_detected_total', 'Signals taken into the pipeline', 'counter', pipeline.signalsDetected),
      metric('pipeline_audit_passed_total', 'Signals that passed the contract audit', 'counter', pipeline.passedAudit),
      metric('pipeline_audit_rejected_total', 'Signals rejected by the contract audit', 'counter', pipeline.rejectedAudit),
      metric('pipeline_trades_executed_total', 'Buys that opened a position', 'counter', pipeline.tradesExecuted),
      metric('pipeline_trades_failed_total', 'Buys that did not open a position', 'counter', pipeline.tradesFailed),
      metric('pipeline_audit_cache_hits_total', 'Audits served from cache', 'counter', auditor.cacheHits),
      metric('pipeline_open_positions', 'Open positions', 'gauge', engine.openPositions),
      metric('pipeline_win_rate_percent', 'Share of closed trades with positive P&L', 'gauge', engine.winRate),
      metric('pipeline_total_pnl_usd', 'Cumulative realized P&L in USD', 'gauge', engine.totalProfitUsd),
    );
  }

  return blocks.join('\n');
}

/**
 * Small HTTP server exposing health, status, signals, positions and metrics
 */
export class StatusServer {
  private server: http.Server | null = null;
  private port: number;
  private startTime: number;
  private providers: StatusProviders | null = null;

  constructor(port: number = SERVER_CONFIG.port) {
    this.port = port;
    this.startTime = Date.now();
  }

  setProviders(providers: StatusProviders): void {
    this.providers = providers;
  }

  start(): Promise<void> {
    return new Promise((resolve, reject) => {
      const server = http.createServer((req, res) => {
        this.handleRequest(req, res);
      });
      this.server = server;

      server.on('error', (error: NodeJS.ErrnoException) => {
        if (error.code === 'EADDRINUSE') {
          log.warn(`Port ${this.port} in use, trying ${this.port + 1}`);
          this.port += 1;
          server.listen(this.port);
        } else {
          reject(error);
        }
      });

      server.listen(this.port, () => {
        const address = server.address();
        if (address && typeof address !== 'string') {
          this.port = address.port;
        }
        log.info(`Status server listening on port ${this.port}`);
        resolve();
      });
    });
  }

  private uptimeSeconds(): number {
    return Math.floor((Date.now() - this.startTime) / 1000);
  }

  private handleRequest(req: http.IncomingMessage, res: http.ServerResponse): void {
    const url = new URL(req.url ?? '/', 'http://localhost');

    res.setHeader('Access-Control-Allow-Origin', '*');
    res.setHeader('Content-Type', 'application/json');

    if (req.method !== 'GET') {
      res.statusCode = 405;
      res.end(JSON.stringify({ error: 'Method not allowed' }));
      return;
    }

    switch (url.pathname) {
      case '/':
      case '/health':
        this.handleHealth(res);
        break;
      case '/status':
        this.respond(res, providers => ({
          uptime: this.uptimeSeconds(),
          timestamp: new Date().toISOString(),
          ...providers.status(),
          performance: providers.performance(),
        }));
        break;
      case '/signals': {
        const limit = Number(url.searchParams.get('limit') ?? '20');
        const safeLimit = Number.isInteger(limit) && limit > 0 ? Math.min(limit, 100) : 20;
        this.respond(res, providers => ({ signals: providers.signals(safeLimit) }));
        break;
      }
      case '/positions':
        this.respond(res, providers => ({ ...providers.positions(), rejections: providers.rejections() }));
        break;
      case '/metrics':
        this.handleMetrics(res);
        break;
      default:
        res.statusCode = 404;
        res.end(JSON.stringify({ error: 'Not found' }));
    }
  }

  private handleHealth(res: http.ServerResponse): void {
    const health: HealthStatus = {
      status: 'healthy',
      uptime: this.uptimeSeconds(),
      timestamp: new Date().toISOString(),
    };

    res.statusCode = 200;
    res.end(JSON.stringify(health));
  }

  private respond(res: http.ServerResponse, build: (providers: StatusProviders) => unknown): void {
    if (!this.providers) {
      res.statusCode = 503;
      res.end(JSON.stringify({ error: 'Pipeline not started' }));
      return;
    }
    res.statusCode = 200;
    res.end(JSON.stringify(build(this.providers), null, 2));
  }

  private handleMetrics(res: http.ServerResponse): void {
    const text = buildMetricsText(
      this.uptimeSeconds(),
      process.memoryUsage().heapUsed,
      this.providers?.status()
    );
    res.setHeader('Content-Type', 'text/plain; charset=utf-8');
    res.statusCode = 200;
    res.end(text);
  }

  stop(): Promise<void> {
    return new Promise((resolve) => {
      const server = this.server;
      if (!server) {
        resolve();
        return;
      }
      this.server = null;
      server.close(() => {
        log.info('Status server stopped');
        resolve();
      });
    });
  }

  getPort(): number {
    return this.port;
  }
}
