/**
 * TCP CoT 전송 (TAK 서버 스트리밍 포트)
 *
 * 연결 하나를 유지하며, 끊어지면 다음 전송 때 다시 연결
 * 재시도/백오프 없음: 연결 실패한 이벤트는 버려짐
 */

import * as net from 'net';
import { CotTransport } from '../../core/dispatch/CotTransport';
import { createLogger, Logger } from '../../core/logging/console';

export interface TcpCotTransportConfig {
  host: string;
  port: number;
}

export class TcpCotTransport implements CotTransport {
  readonly name = 'tcp';
  private readonly config: TcpCotTransportConfig;
  private readonly logger: Logger;
  private connection: Promise<net.Socket> | null = null;
  private socket: net.Socket | null = null;

  constructor(config: TcpCotTransportConfig, logger: Logger = createLogger('TCP')) {
    this.config = config;
    this.logger = logger;
  }

  get connected(): boolean {
    return this.socket !== null;
  }

  sendEvent(bytes: Buffer): Promise<void> {
    return this.connect().then(
      (socket) =>
        new Promise<void>((resolve, reject) => {
          socket.write(bytes, (error) => {
            if (error) reject(error);
            else resolve();
          });
        })
    );
  }

  close(): Promise<void> {
    const socket = this.socket;
    this.socket = null;
    this.connection = null;
    if (!socket) return Promise.resolve();
    return new Promise((resolve) => {
      socket.end(() => resolve());
    });
  }

  private connect(): Promise<net.Socket> {
    if (this.connection) return this.connection;

    const { host, port } = this.config;
    this.connection = new Promise((resolve, reject) => {
      const socket = net.createConnection({ host, port });

      const onConnectError = (error: Error) => {
        this.connection = null;
        reject(error);
      };
      socket.once('error', onConnectError);

      socket.once('connect', () => {
        socket.off('error', onConnectError);
        socket.on('error', (error) => {
          this.logger.warn(`연결 오류: ${error.message}`);
        });
        socket.on('close', () => {
          if (this.socket === socket) {
            this.logger.warn(`연결 종료됨: ${host}:${port} (다음 전송 시 재연결)`);
            this.socket = null;
            this.connection = null;
          }
        });
        this.socket = socket;
        this.logger.info(`TAK 서버 연결: ${host}:${port}`);
        resolve(socket);
      });
    });
    return this.connection;
  }
}
