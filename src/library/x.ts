import ms from 'ms';
import * as x from 'x-value';

/**
 * Duration written as an `ms` string, e.g.: "30s", "1h".
 */
export const DurationString = x.string.refined<'duration string'>(value => {
  if (!Number.isFinite(ms(value))) {
    throw new TypeError(`Invalid duration "${value}"`);
  }

  return value;
});

export const Duration = x.union([DurationString, x.integerRange({min: 0})]);

export type Duration = x.TypeOf<typeof Duration>;

export function parseDuration(duration: Duration): number {
  return typeof duration === 'number' ? duration : ms(duration);
}
