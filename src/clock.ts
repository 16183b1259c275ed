import { getUnixTime } from "date-fns";

export interface Clock {
  /** Whole seconds since the Unix epoch. */
  now(): number;
}

export const systemClock: Clock = {
  now: () => getUnixTime(new Date())
};
