import { Injectable } from '@nestjs/common';
import { setTimeout as delay } from 'timers/promises';
import { Clock } from '@/application/ports/clock.port';

@Injectable()
export class SystemClock implements Clock {
  now(): number {
    return Date.now();
  }

  sleep(ms: number): Promise<void> {
    return delay(ms);
  }
}
