import type { DayBucket, Direction, ScheduleData, TrainSchedule } from '@shared/types';
import { DAY_BUCKETS, DIRECTIONS, SERVICE_TIMEZONE } from '@shared/constants';

// Trains running shortly after midnight belong to the previous service day
const SERVICE_DAY_ROLLOVER_MINUTES = 3 * 60;

export interface TrainScheduleMatch {
  line: string;
  day: DayBucket;
  direction: Direction;
  schedule: TrainSchedule;
}

/**
 * Day bucket of the service day `date` falls in, in the railroad's timezone.
 */
export function getServiceDayBucket(date: Date): DayBucket {
  const adjusted = new Date(date.getTime() - SERVICE_DAY_ROLLOVER_MINUTES * 60 * 1000);
  const weekday = new Intl.DateTimeFormat('en-US', {
    timeZone: SERVICE_TIMEZONE,
    weekday: 'long',
  }).format(adjusted);

  if (weekday === 'Saturday') return 'sat';
  if (weekday === 'Sunday') return 'sun';
  return 'mon-fri';
}

/**
 * Find a train's timetable. Searches `day` first when given, then every
 * other bucket, since a train number can run on more than one day type.
 */
export function findTrainSchedule(
  data: ScheduleData,
  trainNo: string,
  day?: DayBucket,
): TrainScheduleMatch | null {
  const days = day ? [day, ...DAY_BUCKETS.filter(d => d !== day)] : DAY_BUCKETS;

  for (const bucket of days) {
    for (const [line, byDay] of Object.entries(data)) {
      const directions = byDay[bucket];
      if (!directions) continue;

      for (const direction of DIRECTIONS) {
        const schedule = directions[direction]?.find(train => train.trainNo === trainNo);
        if (schedule) {
          return { line, day: bucket, direction, schedule };
        }
      }
    }
  }

  return null;
}

/**
 * Stops a train still has to make after `currentStop`, in route order.
 * Unknown current stop -> the full list.
 */
export function remainingStops(schedule: TrainSchedule, currentStop: string | null): TrainSchedule['stops'] {
  if (!currentStop) return schedule.stops;
  const index = schedule.stops.findIndex(stop => stop.stop === currentStop);
  return index === -1 ? schedule.stops : schedule.stops.slice(index + 1);
}
