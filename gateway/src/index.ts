/**
 * Remote ID → CoT 게이트웨이 서버
 * 진입점
 */

import { getConfig } from './config';
import { setLogLevel, createLogger } from './core/logging/console';
import { getEventLogger, resetEventLogger } from './core/logging/logger';
import { describeError, ErrorLogger } from './core/errors/errorLogger';
import { ISink } from './core/sinks/ISink';
import { AdapterFactory } from './adapters/AdapterFactory';
import { WebSocketSink } from './adapters/sinks/WebSocketSink';
import { DroneGateway } from './gateway';
import { GatewayWebSocketServer } from './websocket/server';

const log = createLogger('Gateway');

async function main(): Promise<void> {
  const config = getConfig();
  setLogLevel(config.logLevel);

  console.log('========================================');
  console.log('  Remote ID → CoT 게이트웨이');
  console.log('========================================');

  const eventLogger = getEventLogger({ logsDir: config.logsDir, enabled: config.eventLogEnabled });
  const errorLogger = ErrorLogger.getInstance();
  const stopStats = errorLogger.startStatsReporter();

  // 서버 핸들러는 게이트웨이/싱크 생성 후에만 호출됨
  let gateway: DroneGateway | null = null;
  let wsSink: WebSocketSink | null = null;

  const server = new GatewayWebSocketServer({
    port: config.port,
    security: config,
    handlers: {
      onTelemetry: (payload) => {
        gateway?.ingest(payload);
      },
      onSystemStatus: (payload) => {
        gateway?.ingestSystemStatus(payload);
      },
      getSnapshot: () => wsSink?.snapshot() ?? [],
      getStatus: () => {
        const stats = gateway?.getStats();
        return {
          active_drones: stats?.activeDrones ?? 0,
          ingested: stats?.ingested ?? 0,
          dropped: stats?.dropped ?? 0,
          correlated: stats?.correlated ?? 0,
          sent: stats?.sent ?? 0,
          failed: stats?.failed ?? 0,
          evicted: stats?.evicted ?? 0,
          system_updates: stats?.systemStatus ?? 0,
        };
      },
    },
    errorLogger,
  });

  wsSink = AdapterFactory.createWebSocketSink(config, server);
  const sinks: ISink[] = wsSink ? [wsSink] : [];

  const activeGateway = new DroneGateway(config, {
    transport: AdapterFactory.createTransport(config),
    sinks,
    affiliations: AdapterFactory.createAffiliationStore(config),
    errorLogger,
    eventLogger,
  });
  gateway = activeGateway;

  await server.start();
  activeGateway.start();

  let shuttingDown = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    log.info(`${signal} 수신, 종료 중...`);
    stopStats();
    await activeGateway.stop();
    await server.stop();
    await resetEventLogger();
    process.exit(0);
  };

  // 종료 시그널 처리
  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.on(signal, () => {
      shutdown(signal).catch((error: unknown) => {
        log.error('종료 중 오류:', describeError(error));
        process.exit(1);
      });
    });
  }

  log.info('게이트웨이 준비 완료');
  log.info(`수신기/C2 UI는 ws://localhost:${config.port} 으로 연결하세요`);
}

main().catch((error: unknown) => {
  log.error('시작 실패:', describeError(error));
  process.exit(1);
});
