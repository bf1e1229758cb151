export interface DateWindow {
    index: number;
    start: string;  // inclusive, YYYY-MM-DD
    end: string;    // inclusive, YYYY-MM-DD
    query: string;
}

export interface DateWindowPlan {
    today: Date;
    windowDays: number;
    windowCount: number;
    qualifiers?: string;
}

const DAY_MS = 24 * 60 * 60 * 1000;

export const formatDay = (date: Date): string => date.toISOString().split('T')[0];

const startOfUtcDay = (date: Date): Date =>
    new Date(Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate()));

const assertPositiveInteger = (name: string, value: number) => {
    if (!Number.isInteger(value) || value < 1) {
        throw new Error(`${name}=${String(value)} must be an integer >= 1`);
    }
};

/**
 * Walks backward from `today` in creation-date windows, newest first.
 * Each window ends one day before the previous one starts, so consecutive
 * windows are contiguous and never overlap (search date ranges are inclusive).
 */
export function* planDateWindows(plan: DateWindowPlan): Generator<DateWindow, void, undefined> {
    assertPositiveInteger('windowDays', plan.windowDays);
    assertPositiveInteger('windowCount', plan.windowCount);
    const qualifiers = plan.qualifiers ?? 'is:public';

    let start = startOfUtcDay(plan.today);
    for (let index = 0; index < plan.windowCount; index++) {
        const end = new Date(start.getTime() - DAY_MS);
        start = new Date(end.getTime() - plan.windowDays * DAY_MS);

        const from = formatDay(start);
        const to = formatDay(end);
        yield { index, start: from, end: to, query: `${qualifiers} created:${from}..${to}`.trim() };
    }
}
