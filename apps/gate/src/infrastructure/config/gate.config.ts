import { registerAs } from '@nestjs/config';
import { GateSettings } from '@/application/settings/gate-settings';
import { validateEnv } from './env.validation';
import { createGateSettings } from './gate-settings.factory';

export const gateConfig = registerAs('gate', (): GateSettings => createGateSettings(validateEnv()));
