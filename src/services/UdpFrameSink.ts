import dgram from 'dgram';
import logger from '../utils/logger';

export interface FrameSink {
  send(frame: Uint8Array): Promise<void>;
  close(): Promise<void>;
}

/**
 * Sends each frame as one UDP datagram to a fixed peer
 */
export class UdpFrameSink implements FrameSink {
  private socket: dgram.Socket | null = null;

  constructor(
    private readonly host: string,
    private readonly port: number,
  ) {}

  private getSocket(): dgram.Socket {
    if (!this.socket) {
      const socket = dgram.createSocket('udp4');
      socket.on('error', (error: Error) => {
        logger.error('UDP sink socket error', { host: this.host, port: this.port, error: error.message });
      });
      this.socket = socket;
    }
    return this.socket;
  }

  send(frame: Uint8Array): Promise<void> {
    const socket = this.getSocket();
    return new Promise<void>((resolve, reject) => {
      socket.send(frame, this.port, this.host, (error) => {
        if (error) {
          reject(error);
          return;
        }
        resolve();
      });
    });
  }

  close(): Promise<void> {
    const { socket } = this;
    if (!socket) {
      return Promise.resolve();
    }
    this.socket = null;
    return new Promise<void>((resolve) => {
      socket.close(() => resolve());
    });
  }
}
