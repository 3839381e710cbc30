import { Module } from '@nestjs/common';
import { DataSource } from 'typeorm';
import Redis from 'ioredis';
import * as amqp from 'amqplib';
import { DEPENDENCY_PROBE } from '@/application/ports/dependency-probe.port';
import { DATA_SOURCE_FACTORY, DataSourceFactory, PostgresqlProbe } from './postgresql.probe';
import { REDIS_CLIENT_FACTORY, RedisClientFactory, RedisProbe } from './redis.probe';
import { AMQP_CONNECT, AmqpConnect, RabbitmqProbe } from './rabbitmq.probe';
import { DependencyProbeDispatcher } from './dependency-probe.dispatcher';

const createDataSource: DataSourceFactory = (options) => new DataSource(options);
const createRedisClient: RedisClientFactory = (options) => new Redis(options);
const connectAmqp: AmqpConnect = (options, socketOptions) => amqp.connect(options, socketOptions);

@Module({
  providers: [
    { provide: DATA_SOURCE_FACTORY, useValue: createDataSource },
    { provide: REDIS_CLIENT_FACTORY, useValue: createRedisClient },
    { provide: AMQP_CONNECT, useValue: connectAmqp },
    PostgresqlProbe,
    RedisProbe,
    RabbitmqProbe,
    {
      provide: DEPENDENCY_PROBE,
      useClass: DependencyProbeDispatcher,
    },
  ],
  exports: [DEPENDENCY_PROBE],
})
export class ProbesModule {}
