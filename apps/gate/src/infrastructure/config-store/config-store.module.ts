import { Module } from '@nestjs/common';
import Consul from 'consul';
import { CONFIG_STORE } from '@/application/ports/config-store.port';
import {
  CONSUL_CLIENT_FACTORY,
  ConsulClientFactory,
  ConsulConfigStore,
} from './consul-config-store.adapter';

const createConsulClient: ConsulClientFactory = (options) => new Consul(options);

@Module({
  providers: [
    { provide: CONSUL_CLIENT_FACTORY, useValue: createConsulClient },
    { provide: CONFIG_STORE, useClass: ConsulConfigStore },
  ],
  exports: [CONFIG_STORE],
})
export class ConfigStoreModule {}
