import { getLogger } from '../shared/logger.js';
import type { ConfirmedCourse } from '../pipeline/types.js';
import type { DeliveryChannel, DeliveryReport } from './types.js';

const log = getLogger('delivery', { channel: 'log' });

/** Writes each course to the log. Used when no Telegram bot is configured. */
export class LogChannel implements DeliveryChannel {
  readonly name = 'log';

  async deliver(courses: readonly ConfirmedCourse[]): Promise<DeliveryReport> {
    for (const course of courses) {
      log.info({ title: course.title, url: course.url, source: course.source }, 'Free course');
    }
    return { channel: this.name, delivered: courses.length, failed: [] };
  }
}
