import { createConnection } from 'net';
import type { Socket } from 'net';
import { EventEmitter } from 'events';
import { ConnectError, StreamClosedError, StreamTimeoutError } from '../utils/errors';
import { logger } from '../utils/logger';

interface PendingRead {
  /** Returns the bytes for this read once they are buffered, otherwise null */
  take: () => Buffer | null;
  resolve: (data: Buffer) => void;
  reject: (error: Error) => void;
  timer: NodeJS.Timeout;
}

/**
 * Buffered TCP connection with exact, delimited and idle-terminated reads.
 * Incoming data accumulates until a pending read can be satisfied; one read
 * is outstanding at a time.
 */
export class SocketConnection extends EventEmitter {
  private socket: Socket | null = null;
  private buffer: Buffer = Buffer.alloc(0);
  private pending: PendingRead | null = null;
  private remoteClosed = false;
  private endpoint = '';

  async open(host: string, port: number, timeoutMs: number): Promise<void> {
    if (this.socket) {
      throw new ConnectError('Socket already open');
    }

    const endpoint = `${host}:${port}`;

    return new Promise((resolve, reject) => {
      const socket = createConnection({ host, port });

      const onError = (error: Error) => {
        clearTimeout(timer);
        socket.removeListener('connect', onConnect);
        socket.destroy();
        reject(new ConnectError(`Failed to connect to ${endpoint}: ${error.message}`, error));
      };

      const onConnect = () => {
        clearTimeout(timer);
        socket.removeListener('error', onError);
        this.socket = socket;
        this.endpoint = endpoint;
        this.buffer = Buffer.alloc(0);
        this.remoteClosed = false;
        this.setupListeners(socket);
        logger.info(`Connected to ${endpoint}`);
        this.emit('connected');
        resolve();
      };

      const timer = setTimeout(() => {
        socket.removeListener('connect', onConnect);
        socket.removeListener('error', onError);
        socket.destroy();
        reject(new ConnectError(`Timed out connecting to ${endpoint} after ${timeoutMs} ms`));
      }, timeoutMs);

      socket.once('connect', onConnect);
      socket.once('error', onError);
    });
  }

  isOpen(): boolean {
    return this.socket !== null && !this.remoteClosed;
  }

  async write(data: Buffer | string): Promise<void> {
    const socket = this.socket;
    if (!socket || this.remoteClosed) {
      throw new StreamClosedError(`Cannot write to ${this.endpoint || 'socket'}: not connected`);
    }

    return new Promise((resolve, reject) => {
      socket.write(data, (error) => {
        if (error) {
          reject(new StreamClosedError(`Failed to write to ${this.endpoint}: ${error.message}`));
          return;
        }
        resolve();
      });
    });
  }

  /** Exactly `length` bytes, accumulated across as many packets as it takes */
  readExact(length: number, timeoutMs: number): Promise<Buffer> {
    return this.read(
      () => (this.buffer.length >= length ? this.consume(length) : null),
      timeoutMs,
      `${length} bytes`
    );
  }

  /** Bytes up to `terminator`; the terminator is consumed but not returned */
  readUntil(terminator: number, timeoutMs: number): Promise<Buffer> {
    return this.read(
      () => {
        const index = this.buffer.indexOf(terminator);
        if (index < 0) return null;
        const line = this.consume(index);
        this.consume(1);
        return line;
      },
      timeoutMs,
      `terminator 0x${terminator.toString(16)}`
    );
  }

  /**
   * Everything that arrives until the peer goes quiet for `idleMs` or closes.
   * Resolves empty only if nothing arrived at all.
   */
  readUntilIdle(idleMs: number): Promise<Buffer> {
    return new Promise((resolve) => {
      const finish = () => {
        clearTimeout(timer);
        this.removeListener('data-buffered', onData);
        this.removeListener('remote-closed', finish);
        resolve(this.consume(this.buffer.length));
      };
      const onData = () => {
        clearTimeout(timer);
        timer = setTimeout(finish, idleMs);
      };

      let timer = setTimeout(finish, idleMs);
      if (this.remoteClosed) {
        finish();
        return;
      }
      this.on('data-buffered', onData);
      this.on('remote-closed', finish);
    });
  }

  /** Drop a single leading byte if it is already buffered */
  discardIfNext(byte: number): void {
    if (this.buffer.length > 0 && this.buffer[0] === byte) {
      this.consume(1);
    }
  }

  async close(): Promise<void> {
    const socket = this.socket;
    if (!socket) {
      return;
    }

    this.socket = null;
    this.rejectPending(new StreamClosedError(`Connection to ${this.endpoint} closed locally`, this.buffer.length));
    this.buffer = Buffer.alloc(0);

    await new Promise<void>((resolve) => {
      if (socket.destroyed) {
        resolve();
        return;
      }
      socket.once('close', () => resolve());
      socket.destroy();
    });

    logger.info(`Disconnected from ${this.endpoint}`);
    this.emit('disconnected');
  }

  private read(take: () => Buffer | null, timeoutMs: number, what: string): Promise<Buffer> {
    if (this.pending) {
      return Promise.reject(new StreamClosedError('Another read is already pending'));
    }

    const ready = take();
    if (ready) {
      return Promise.resolve(ready);
    }
    if (this.remoteClosed || !this.socket) {
      return Promise.reject(new StreamClosedError(
        `Remote closed with ${this.buffer.length} byte(s) buffered, waiting for ${what}`,
        this.buffer.length
      ));
    }

    return new Promise((resolve, reject) => {
      const timer = setTimeout(() => {
        this.pending = null;
        reject(new StreamTimeoutError(
          `No ${what} from ${this.endpoint} within ${timeoutMs} ms (${this.buffer.length} buffered)`
        ));
      }, timeoutMs);

      this.pending = { take, resolve, reject, timer };
    });
  }

  private consume(length: number): Buffer {
    const out = Buffer.from(this.buffer.subarray(0, length));
    this.buffer = this.buffer.subarray(length);
    return out;
  }

  private setupListeners(socket: Socket): void {
    socket.on('data', (data: Buffer) => {
      this.buffer = Buffer.concat([this.buffer, data]);
      this.emit('data-buffered');

      const pending = this.pending;
      if (pending) {
        const ready = pending.take();
        if (ready) {
          clearTimeout(pending.timer);
          this.pending = null;
          pending.resolve(ready);
        }
      }
    });

    socket.on('error', (error) => {
      logger.error(`Socket error on ${this.endpoint}:`, error);
      this.emit('socket-error', error);
    });

    socket.on('close', () => {
      this.remoteClosed = true;
      this.rejectPending(new StreamClosedError(
        `Remote closed ${this.endpoint} with ${this.buffer.length} byte(s) buffered`,
        this.buffer.length
      ));
      this.emit('remote-closed');
    });
  }

  private rejectPending(error: Error): void {
    const pending = this.pending;
    if (pending) {
      clearTimeout(pending.timer);
      this.pending = null;
      pending.reject(error);
    }
  }
}
