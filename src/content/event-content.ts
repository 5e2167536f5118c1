/**
 * Date-driven content: special dates, weekday greetings and a simple
 * per-channel content calendar.
 */

import { ContentCatalog } from './content-catalog';
import { ContentCategory } from './types';

const SPECIAL_DATES: Record<string, string> = {
  '01-01': '🎉 Happy New Year! May this year bring you plenty of success!',
  '07-14': '🇫🇷 Happy national day!',
  '05-01': '🌸 Happy Labour Day!',
  '12-25': '🎄 Merry Christmas! Enjoy the holidays!'
};

const WEEKDAY_CONTENT: Partial<Record<number, string>> = {
  1: '💪 New week, new challenges! Have a great week, everyone!',
  5: '🎉 Have a great weekend, everyone! Enjoy some well-earned rest!'
};

const DAY_NAMES = ['Sunday', 'Monday', 'Tuesday', 'Wednesday', 'Thursday', 'Friday', 'Saturday'];

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

export function formatDate(date: Date): string {
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
}

/**
 * Special-date text first, then weekday text, otherwise null.
 */
export function getEventContent(date: Date): string | null {
  const key = `${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
  return SPECIAL_DATES[key] ?? WEEKDAY_CONTENT[date.getDay()] ?? null;
}

export interface CalendarEntry {
  date: string;
  dayName: string;
  category: ContentCategory;
  suggestedTimes: string[];
  eventContent: string | null;
  templatesAvailable: number;
}

export async function buildContentCalendar(
  catalog: ContentCatalog,
  destinationId: string,
  days: number = 7,
  start: Date = new Date()
): Promise<CalendarEntry[]> {
  const preferences = await catalog.getChannelPreferences(destinationId);
  const templates = await catalog.getTemplates();
  const categories: ContentCategory[] = preferences.preferredCategories.length > 0
    ? preferences.preferredCategories
    : ['motivation'];

  const calendar: CalendarEntry[] = [];
  for (let i = 0; i < days; i++) {
    const date = new Date(start.getFullYear(), start.getMonth(), start.getDate() + i);
    const category = categories[i % categories.length];

    calendar.push({
      date: formatDate(date),
      dayName: DAY_NAMES[date.getDay()],
      category,
      suggestedTimes: preferences.bestTimes,
      eventContent: getEventContent(date),
      templatesAvailable: templates.filter(template => template.category === category).length
    });
  }

  return calendar;
}
