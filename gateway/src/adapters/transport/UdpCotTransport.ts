/**
 * UDP CoT 전송 (유니캐스트 또는 멀티캐스트)
 */

import * as dgram from 'dgram';
import * as net from 'net';
import { CotTransport } from '../../core/dispatch/CotTransport';
import { createLogger, Logger } from '../../core/logging/console';

export interface UdpCotTransportConfig {
  host: string;
  port: number;
  /** 멀티캐스트 그룹일 때 적용할 TTL */
  multicastTtl?: number;
}

/**
 * 224.0.0.0/4 (IPv4 멀티캐스트) 여부
 */
export function isMulticastAddress(host: string): boolean {
  if (!net.isIPv4(host)) return false;
  const first = Number(host.split('.')[0]);
  return first >= 224 && first <= 239;
}

export class UdpCotTransport implements CotTransport {
  readonly name = 'udp';
  private readonly config: UdpCotTransportConfig;
  private readonly logger: Logger;
  private socket: dgram.Socket | null = null;
  private ready: Promise<dgram.Socket> | null = null;

  constructor(config: UdpCotTransportConfig, logger: Logger = createLogger('UDP')) {
    this.config = config;
    this.logger = logger;
  }

  sendEvent(bytes: Buffer): Promise<void> {
    return this.open().then(
      (socket) =>
        new Promise<void>((resolve, reject) => {
          socket.send(bytes, this.config.port, this.config.host, (error) => {
            if (error) reject(error);
            else resolve();
          });
        })
    );
  }

  close(): Promise<void> {
    const socket = this.socket;
    this.socket = null;
    this.ready = null;
    if (!socket) return Promise.resolve();
    return new Promise((resolve) => {
      socket.close(() => resolve());
    });
  }

  /**
   * 소켓 생성 (첫 전송 시 한 번)
   */
  private open(): Promise<dgram.Socket> {
    if (this.ready) return this.ready;

    const socket = dgram.createSocket(net.isIPv6(this.config.host) ? 'udp6' : 'udp4');
    socket.on('error', (error) => {
      this.logger.error('UDP 소켓 오류:', error.message);
    });
    socket.unref();
    this.socket = socket;

    this.ready = new Promise((resolve) => {
      socket.bind(0, () => {
        if (isMulticastAddress(this.config.host)) {
          socket.setMulticastTTL(this.config.multicastTtl ?? 1);
          this.logger.info(`멀티캐스트 전송: ${this.config.host}:${this.config.port} (TTL ${this.config.multicastTtl ?? 1})`);
        } else {
          this.logger.info(`UDP 전송: ${this.config.host}:${this.config.port}`);
        }
        resolve(socket);
      });
    });
    return this.ready;
  }
}
