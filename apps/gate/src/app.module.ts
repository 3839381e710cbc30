import { Module } from '@nestjs/common';
import { AppConfigModule } from './infrastructure/config/app-config.module';
import { ProbesModule } from './infrastructure/probes/probes.module';
import { ConfigStoreModule } from './infrastructure/config-store/config-store.module';
import { SystemClock } from './infrastructure/timing/system-clock.adapter';
import { CLOCK } from './application/ports/clock.port';
import { TargetResolver } from './application/services/target-resolver.service';
import { VerifyConfigStoreUseCase } from './application/use-cases/readiness/verify-config-store.use-case';
import { RunChecksUseCase } from './application/use-cases/readiness/run-checks.use-case';
import { WaitForDependenciesUseCase } from './application/use-cases/readiness/wait-for-dependencies.use-case';
import { GateCommand } from './presentation/cli/gate.command';

@Module({
  imports: [AppConfigModule, ProbesModule, ConfigStoreModule],
  providers: [
    { provide: CLOCK, useClass: SystemClock },
    TargetResolver,
    VerifyConfigStoreUseCase,
    RunChecksUseCase,
    WaitForDependenciesUseCase,
    GateCommand,
  ],
})
export class AppModule {}
