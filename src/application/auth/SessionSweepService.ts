import type { ILogger } from '../../infrastructure/platform/logger';
import { IntervalService } from '../host/host';
import { AuthService } from './AuthService';

/**
 * Periodically removes expired sessions
 */
export class SessionSweepService extends IntervalService {
  readonly name = 'session-sweep';

  constructor(
    private readonly auth: AuthService,
    private readonly logger: ILogger,
    intervalMs: number,
  ) {
    super(intervalMs);
  }

  protected async execute(): Promise<void> {
    try {
      await this.auth.sweep();
    } catch (error) {
      // The next tick tries again
      this.logger.error('Session sweep failed', error);
    }
  }

  protected onFailure(error: unknown): void {
    this.logger.error('Session sweep stopped', error);
  }
}
