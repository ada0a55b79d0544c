/**
 * Adapter Factory
 *
 * 설정에 따라 CoT 전송/싱크/소속 저장소 구현체 생성
 */

import { GatewayConfig } from '../config';
import { CotTransport } from '../core/dispatch/CotTransport';
import { EventBroadcaster } from '../websocket/server';
import { AffiliationStore } from './affiliation/affiliationStore';
import { WebSocketSink } from './sinks/WebSocketSink';
import { TcpCotTransport } from './transport/TcpCotTransport';
import { UdpCotTransport } from './transport/UdpCotTransport';

export class AdapterFactory {
  /**
   * CoT 전송 생성 (none이면 null: 인코딩만 수행)
   */
  static createTransport(
    config: Pick<GatewayConfig, 'cotTransport' | 'cotHost' | 'cotPort' | 'cotMulticastTtl'>
  ): CotTransport | null {
    switch (config.cotTransport) {
      case 'udp':
        return new UdpCotTransport({
          host: config.cotHost,
          port: config.cotPort,
          multicastTtl: config.cotMulticastTtl,
        });
      case 'tcp':
        return new TcpCotTransport({ host: config.cotHost, port: config.cotPort });
      case 'none':
        return null;
    }
  }

  /**
   * WebSocket 싱크 생성 (비활성화면 null)
   */
  static createWebSocketSink(
    config: Pick<GatewayConfig, 'wsSinkEnabled'>,
    broadcaster: EventBroadcaster
  ): WebSocketSink | null {
    return config.wsSinkEnabled ? new WebSocketSink(broadcaster) : null;
  }

  static createAffiliationStore(config: Pick<GatewayConfig, 'affiliationFile'>): AffiliationStore {
    return new AffiliationStore(config.affiliationFile);
  }
}
