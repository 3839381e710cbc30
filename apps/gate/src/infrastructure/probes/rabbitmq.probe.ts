import { Inject, Injectable, Logger } from '@nestjs/common';
import { randomUUID } from 'crypto';
import { Options } from 'amqplib';
import { BrokerTarget, describeTarget } from '@/core/domain/readiness/value-objects/dependency-target.vo';
import { ConnectionError } from '@/core/domain/readiness/errors/connection.error';
import { classifyProbeFailure } from './probe-failure';
import { withTimeout } from './with-timeout';

export const AMQP_CONNECT = Symbol('AMQP_CONNECT');

export interface AmqpChannelLike {
  assertQueue(queue: string, options: Options.AssertQueue): Promise<unknown>;
  sendToQueue(queue: string, content: Buffer): boolean;
  waitForConfirms(): Promise<void>;
  get(queue: string, options: Options.Get): Promise<false | { content: Buffer }>;
  deleteQueue(queue: string): Promise<unknown>;
  close(): Promise<void>;
}

export interface AmqpConnectionLike {
  createConfirmChannel(): Promise<AmqpChannelLike>;
  close(): Promise<void>;
  on(event: 'error', listener: (error: Error) => void): unknown;
}

export type AmqpConnect = (
  options: Options.Connect,
  socketOptions: { timeout: number },
) => Promise<AmqpConnectionLike>;

const AUTH_REFUSED = /ACCESS[_-]REFUSED/;

export const isRabbitmqAuthFailure = (error: Error): boolean => AUTH_REFUSED.test(error.message);

@Injectable()
export class RabbitmqProbe {
  private readonly logger = new Logger(RabbitmqProbe.name);

  constructor(@Inject(AMQP_CONNECT) private readonly connect: AmqpConnect) {}

  async probe(target: BrokerTarget, timeoutMs: number): Promise<string> {
    const endpoint = describeTarget(target);
    let connection: AmqpConnectionLike | undefined;
    let closing: Promise<void> | undefined;
    let abandoned = false;

    const release = (): Promise<void> => {
      if (!connection) return Promise.resolve();
      if (!closing) {
        closing = connection.close().catch((error: unknown) =>
          this.logger.debug(`${endpoint} close failed: ${String(error)}`),
        );
      }
      return closing;
    };

    const attempt = async (): Promise<void> => {
      const opened = await this.connect(
        {
          protocol: 'amqp',
          hostname: target.host,
          port: target.port,
          username: target.credentials?.username,
          password: target.credentials?.password,
          vhost: target.vhost,
        },
        { timeout: timeoutMs },
      );
      opened.on('error', (error) =>
        this.logger.debug(`${endpoint} connection error: ${error.message}`),
      );
      connection = opened;
      if (abandoned) {
        await release();
        return;
      }
      try {
        const channel = await opened.createConfirmChannel();
        const queue = `readiness-gate-${randomUUID()}`;
        await channel.assertQueue(queue, { exclusive: true, autoDelete: true, durable: false });
        channel.sendToQueue(queue, Buffer.from('ping'));
        await channel.waitForConfirms();
        const message = await channel.get(queue, { noAck: true });
        await channel.deleteQueue(queue);
        await channel.close();
        if (message === false) {
          throw new ConnectionError('unreachable', `${endpoint} did not deliver the probe message`);
        }
      } finally {
        await release();
      }
    };

    const abandon = (): void => {
      abandoned = true;
      void release();
    };

    try {
      await withTimeout(attempt(), timeoutMs, endpoint, abandon);
      return endpoint;
    } catch (error) {
      throw classifyProbeFailure(error, isRabbitmqAuthFailure, endpoint);
    }
  }
}
