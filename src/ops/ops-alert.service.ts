import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import * as Sentry from '@sentry/node';
import { EventPublisher } from '../events/event-publisher.service';

export type AlertSeverity = 'info' | 'warning' | 'critical';

export const OPS_ALERT_TOPIC = 'ops.alert';

/** Operator/escalation channel: log, Sentry, and an `ops.alert` event on the bus. */
@Injectable()
export class OpsAlertService {
  private readonly logger = new Logger(OpsAlertService.name);
  private readonly sentryEnabled: boolean;

  constructor(
    private readonly events: EventPublisher,
    private readonly config: ConfigService,
  ) {
    this.sentryEnabled = Boolean(this.config.get<string>('SENTRY_DSN'));
    this.logger.log({
      msg: 'OpsAlert sinks enabled',
      sinks: {
        bus: true,
        log: true,
        sentry: this.sentryEnabled,
      },
    });
    if (!this.sentryEnabled && (this.config.get<string>('NODE_ENV') ?? '').toLowerCase() === 'production') {
      this.logger.warn('Sentry DSN missing in production; ops alerts will log only.');
    }
  }

  async notifyOperator(severity: AlertSeverity, message: string, context: Record<string, unknown> = {}) {
    const entry = { msg: 'Ops alert', severity, alert: message, ...context };
    if (severity === 'critical') {
      this.logger.error(entry);
    } else {
      this.logger.warn(entry);
    }
    if (this.sentryEnabled) {
      Sentry.captureMessage(`Ops alert: ${message}`, {
        level: severity === 'critical' ? 'fatal' : severity === 'warning' ? 'warning' : 'info',
        extra: context,
      });
    }
    await this.events.publish(OPS_ALERT_TOPIC, { severity, message, ...context });
  }
}
