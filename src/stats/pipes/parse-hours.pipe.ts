import { Injectable, PipeTransform } from '@nestjs/common';

export const DEFAULT_WINDOW_HOURS = 24;
export const MAX_WINDOW_HOURS = 720;

const WHOLE_NUMBER = /^\+?\d+$/;

/**
 * Normalizes the `hours` query parameter instead of rejecting it.
 * Missing, malformed, zero or negative values fall back to 24;
 * anything above 720 (30 days) is clamped to 720.
 */
@Injectable()
export class ParseHoursPipe implements PipeTransform<unknown, number> {
  transform(value: unknown): number {
    if (typeof value !== 'string' || !WHOLE_NUMBER.test(value.trim())) {
      return DEFAULT_WINDOW_HOURS;
    }
    const hours = Number(value.trim());
    if (hours < 1) {
      return DEFAULT_WINDOW_HOURS;
    }
    return Math.min(hours, MAX_WINDOW_HOURS);
  }
}
