import type { OperatingWindow, TimeWindow } from "../types";
import type { SeatingReader } from "../store/repository";
import { dayOfWeek, formatClock, parseCalendarDate, parseClock } from "./clock";
import { ClosedError } from "./errors";

/**
 * Resolves the effective operating window of a calendar date
 *
 * An override for the exact date wins outright, closed or not; the weekly
 * pattern is only consulted when there is none. A weekday with no weekly
 * row is closed.
 */
export class HoursResolver {
    constructor(private store: Pick<SeatingReader, 'getWeeklyHours' | 'getSpecialHours'>) { }

    async resolve(date: string): Promise<OperatingWindow> {
        parseCalendarDate(date);

        const special = await this.store.getSpecialHours(date);
        if (special) {
            if (special.isClosed) return { closed: true };

            const { openTime, closeTime, lastReservationTime } = special;
            // an open override without its window is unusable, treat as closed
            if (openTime === undefined || closeTime === undefined || lastReservationTime === undefined) {
                return { closed: true };
            }
            return {
                closed: false,
                open: parseClock(openTime),
                close: parseClock(closeTime),
                lastReservation: parseClock(lastReservationTime)
            };
        }

        const weekly = await this.store.getWeeklyHours(dayOfWeek(date));
        if (!weekly) return { closed: true };

        return {
            closed: false,
            open: parseClock(weekly.openTime),
            close: parseClock(weekly.closeTime),
            lastReservation: parseClock(weekly.lastReservationTime)
        };
    }
}

/**
 * Whether an occupancy window may be booked inside the operating window:
 * open <= start <= lastReservation and end <= close
 */
export const fitsOperatingWindow = (hours: OperatingWindow, window: TimeWindow): boolean => {
    if (hours.closed) return false;
    return window.start >= hours.open
        && window.start <= hours.lastReservation
        && window.end <= hours.close;
}

/**
 * @throws {ClosedError} when the date is closed or the window falls outside its hours
 */
export const ensureWithinHours = (date: string, hours: OperatingWindow, window: TimeWindow): void => {
    if (hours.closed) {
        throw new ClosedError(`Restaurant is closed on ${date}`);
    }
    if (!fitsOperatingWindow(hours, window)) {
        throw new ClosedError(
            `Requested ${formatClock(window.start)} for ${window.end - window.start} minutes is outside operating hours on ${date} ` +
            `(open ${formatClock(hours.open)}-${formatClock(hours.close)}, last reservation ${formatClock(hours.lastReservation)})`
        );
    }
}
