import { formatISO } from "date-fns";
import type { Clock } from "@core/ports/clock.types";

export function createSystemClock(): Clock {
  return {
    nowIso: () => formatISO(new Date()),
  };
}
