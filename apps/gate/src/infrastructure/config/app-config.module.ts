import { Module, Global } from '@nestjs/common';
import { ConfigModule, ConfigType } from '@nestjs/config';
import { GATE_SETTINGS } from '@/application/settings/gate-settings';
import { gateConfig } from './gate.config';

@Global()
@Module({
  imports: [ConfigModule.forRoot({ isGlobal: true, ignoreEnvFile: true, load: [gateConfig] })],
  providers: [
    {
      provide: GATE_SETTINGS,
      useFactory: (settings: ConfigType<typeof gateConfig>) => settings,
      inject: [gateConfig.KEY],
    },
  ],
  exports: [ConfigModule, GATE_SETTINGS],
})
export class AppConfigModule {}
