/**
 * Type definitions for the delivery module.
 */

import type { ConfirmedCourse } from '../pipeline/types.js';

export interface DeliveryFailure {
  url: string;
  error: string;
}

export interface DeliveryReport {
  channel: string;
  delivered: number;
  failed: DeliveryFailure[];
}

/**
 * Destination for confirmed courses. `deliver` resolves with a report even
 * when individual courses fail to send.
 */
export interface DeliveryChannel {
  readonly name: string;
  deliver(courses: readonly ConfirmedCourse[]): Promise<DeliveryReport>;
}
