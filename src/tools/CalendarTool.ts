/**
 * @fileoverview Calendar Tool
 *
 * Events and reminders persisted in a JSON file, plus date lookups.
 *
 * Key Concepts:
 * - CalendarStore: load/save seam; JsonCalendarStore writes the configured
 *   calendar file, tests use an in-memory store
 * - Clock: injected so relative phrases ("明天下午3点") resolve
 *   deterministically
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import { randomUUID } from 'node:crypto';
import { BaseTool } from './BaseTool';
import { clarify, fail, ok } from './outcome';
import { IntentSchema, ToolOutcome } from './types';
import {
  dayOfYear,
  daysBetween,
  formatChineseDate,
  formatClock,
  formatIsoDate,
  isSameDay,
  parseDateTime,
  parseDay,
  weekdayName
} from './dates';
import { Entities } from '../intent/types';
import { entityString } from '../intent/entities';
import { isArray, isBoolean, isNodeSystemError, isNumber, isObject, isString, toInteger } from '../types/TypeGuards';
import { extractErrorDetails, isAssistantError, ValidationError } from '../errors/AssistantErrors';
import logger from '../utils/logger';

export interface CalendarEvent {
  id: string;
  title: string;
  /** ISO timestamp */
  datetime: string;
  durationMinutes: number;
  description: string;
  location: string;
  createdAt: string;
}

export interface Reminder {
  id: string;
  title: string;
  datetime: string;
  message: string;
  createdAt: string;
  completed: boolean;
}

export interface CalendarData {
  events: CalendarEvent[];
  reminders: Reminder[];
}

export interface CalendarStore {
  load(): Promise<CalendarData>;
  save(data: CalendarData): Promise<void>;
}

export type Clock = () => Date;

function parseEvent(value: unknown): CalendarEvent | undefined {
  if (!isObject(value) || !isString(value.id) || !isString(value.title) || !isString(value.datetime)) {
    return undefined;
  }
  return {
    id: value.id,
    title: value.title,
    datetime: value.datetime,
    durationMinutes: isNumber(value.durationMinutes) ? value.durationMinutes : 60,
    description: isString(value.description) ? value.description : '',
    location: isString(value.location) ? value.location : '',
    createdAt: isString(value.createdAt) ? value.createdAt : value.datetime
  };
}

function parseReminder(value: unknown): Reminder | undefined {
  if (!isObject(value) || !isString(value.id) || !isString(value.title) || !isString(value.datetime)) {
    return undefined;
  }
  return {
    id: value.id,
    title: value.title,
    datetime: value.datetime,
    message: isString(value.message) ? value.message : '',
    createdAt: isString(value.createdAt) ? value.createdAt : value.datetime,
    completed: isBoolean(value.completed) ? value.completed : false
  };
}

function defined<T>(value: T | undefined): value is T {
  return value !== undefined;
}

/**
 * Calendar persisted as pretty-printed JSON. A missing file is an empty
 * calendar; entries with an unexpected shape are skipped.
 */
export class JsonCalendarStore implements CalendarStore {
  constructor(private readonly filePath: string) {}

  async load(): Promise<CalendarData> {
    let text: string;
    try {
      text = await fs.readFile(this.filePath, 'utf8');
    } catch (error) {
      if (isNodeSystemError(error) && error.code === 'ENOENT') {
        return { events: [], reminders: [] };
      }
      throw error;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch {
      throw ValidationError.create(`Calendar file is not valid JSON: ${this.filePath}`, 'calendar_load');
    }

    const events = isObject(parsed) && isArray(parsed.events) ? parsed.events.map(parseEvent).filter(defined) : [];
    const reminders = isObject(parsed) && isArray(parsed.reminders)
      ? parsed.reminders.map(parseReminder).filter(defined)
      : [];
    return { events, reminders };
  }

  async save(data: CalendarData): Promise<void> {
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    await fs.writeFile(this.filePath, JSON.stringify(data, null, 2), 'utf8');
  }
}

export interface CalendarToolOptions {
  store: CalendarStore;
  clock?: Clock;
  idGenerator?: () => string;
}

export class CalendarTool extends BaseTool {
  readonly name = 'calendar';
  readonly description = '提供日程管理、提醒设置、日期查询等功能';

  private readonly store: CalendarStore;
  private readonly clock: Clock;
  private readonly newId: () => string;
  private data?: CalendarData;

  constructor(options: CalendarToolOptions) {
    super();
    this.store = options.store;
    this.clock = options.clock ?? (() => new Date());
    this.newId = options.idGenerator ?? (() => randomUUID().slice(0, 8));
  }

  getSupportedIntents(): readonly string[] {
    return [
      'add_event',
      'create_event',
      'get_events',
      'list_events',
      'get_today_events',
      'delete_event',
      'set_reminder',
      'get_reminders',
      'get_date_info'
    ];
  }

  getKeywords(): readonly string[] {
    return ['日程', '日历', '提醒', '事件', '会议', '日期'];
  }

  getIntentSchemas(): readonly IntentSchema[] {
    const when = { type: 'string' as const, description: 'Date and time, e.g. "2026-03-01 14:30" or "明天下午3点"' };
    return [
      {
        intent: 'create_event',
        description: 'Add an event to the calendar',
        parameters: {
          title: { type: 'string', description: 'Event title' },
          datetime: when,
          duration: { type: 'integer', description: 'Duration in minutes, default 60' },
          location: { type: 'string', description: 'Where the event takes place' },
          description: { type: 'string', description: 'Notes' }
        },
        required: ['title', 'datetime']
      },
      {
        intent: 'list_events',
        description: 'Events on a day (defaults to today)',
        parameters: { date: { type: 'string', description: 'YYYY-MM-DD, 今天, 明天 or 后天' } }
      },
      {
        intent: 'delete_event',
        description: 'Delete events by id or title',
        parameters: {
          event_id: { type: 'string', description: 'Event id' },
          title: { type: 'string', description: 'Part of the event title' }
        }
      },
      {
        intent: 'set_reminder',
        description: 'Set a reminder',
        parameters: {
          title: { type: 'string', description: 'What to be reminded of' },
          datetime: when,
          message: { type: 'string', description: 'Extra note' }
        },
        required: ['datetime']
      },
      {
        intent: 'get_date_info',
        description: 'Weekday, day of year and distance from today for a date',
        parameters: { date: { type: 'string', description: 'YYYY-MM-DD, 今天, 明天 or 后天' } }
      }
    ];
  }

  protected async handle(intent: string, entities: Entities): Promise<ToolOutcome> {
    switch (intent) {
      case 'add_event':
      case 'create_event':
        return this.addEvent(entities);
      case 'get_events':
      case 'list_events':
        return this.getEvents(entities);
      case 'get_today_events':
        return this.getTodayEvents();
      case 'delete_event':
        return this.deleteEvent(entities);
      case 'set_reminder':
        return this.setReminder(entities);
      case 'get_reminders':
        return this.getReminders();
      case 'get_date_info':
        return this.getDateInfo(entities);
      default:
        return fail('unsupported_operation', `unsupported_operation: ${intent}`);
    }
  }

  private async addEvent(entities: Entities): Promise<ToolOutcome> {
    const title = entityString(entities, 'title');
    if (!title) {
      return clarify('event_title_missing', '请提供事件标题');
    }
    const when = this.dateTimeText(entities);
    if (!when) {
      return clarify('event_date_missing', '请提供事件日期');
    }

    const now = this.clock();
    const datetime = parseDateTime(when, now);
    if (!datetime) {
      return fail('invalid_datetime', 'invalid_datetime', '日期或时间格式错误');
    }

    const event: CalendarEvent = {
      id: this.newId(),
      title,
      datetime: datetime.toISOString(),
      durationMinutes: toInteger(entities.duration) ?? 60,
      description: entityString(entities, 'description') ?? '',
      location: entityString(entities, 'location') ?? '',
      createdAt: now.toISOString()
    };

    const data = await this.loadData();
    data.events.push(event);
    if (!(await this.persist(data))) {
      data.events.pop();
      return fail('save_failed', 'save_failed', '保存事件失败');
    }

    return ok(
      `event_added: ${event.id}`,
      `事件 '${title}' 已添加到 ${formatChineseDate(datetime)} ${formatClock(datetime)}`
    );
  }

  private async getEvents(entities: Entities): Promise<ToolOutcome> {
    const dateText = entityString(entities, 'date');
    if (!dateText) {
      return this.getTodayEvents();
    }
    const day = parseDay(dateText, this.clock());
    if (!day) {
      return fail('invalid_date_format', 'invalid_date_format', '日期格式错误，请使用YYYY-MM-DD格式');
    }

    const events = await this.eventsOn(day);
    if (events.length === 0) {
      return ok('no_events_found', `${formatChineseDate(day)}没有安排日程`);
    }
    return ok(`events_found: ${events.length}`, `${formatChineseDate(day)}的日程:\n${this.describeEvents(events, true)}`);
  }

  private async getTodayEvents(): Promise<ToolOutcome> {
    const today = this.clock();
    const events = await this.eventsOn(today);
    if (events.length === 0) {
      return ok('no_today_events', '今天没有安排日程');
    }
    return ok(
      `today_events_found: ${events.length}`,
      `今天(${formatChineseDate(today)})的日程:\n${this.describeEvents(events, false)}`
    );
  }

  private async deleteEvent(entities: Entities): Promise<ToolOutcome> {
    const eventId = entityString(entities, 'event_id');
    const title = entityString(entities, 'title');
    if (!eventId && !title) {
      return clarify('event_identifier_missing', '请提供事件ID或标题');
    }

    const data = await this.loadData();
    const matches = (event: CalendarEvent): boolean =>
      (eventId !== undefined && event.id === eventId) || (title !== undefined && event.title.includes(title));
    const removed = data.events.filter(matches);
    if (removed.length === 0) {
      return fail('event_not_found', 'event_not_found', '未找到匹配的事件');
    }

    const previous = data.events;
    data.events = previous.filter((event) => !matches(event));
    if (!(await this.persist(data))) {
      data.events = previous;
      return fail('save_failed', 'save_failed', '保存删除操作失败');
    }
    return ok(`events_deleted: ${removed.length}`, `已删除 ${removed.length} 个事件`);
  }

  private async setReminder(entities: Entities): Promise<ToolOutcome> {
    const message = entityString(entities, 'message') ?? '';
    const title = entityString(entities, 'title') ?? (message !== '' ? message : undefined);
    if (!title) {
      return clarify('reminder_title_missing', '请提供提醒标题');
    }
    const when = this.dateTimeText(entities);
    if (!when) {
      return clarify('reminder_datetime_missing', '请提供提醒时间');
    }

    const now = this.clock();
    const datetime = parseDateTime(when, now);
    if (!datetime) {
      return fail('invalid_datetime', 'invalid_datetime', '时间格式错误');
    }

    const reminder: Reminder = {
      id: this.newId(),
      title,
      datetime: datetime.toISOString(),
      message: message === title ? '' : message,
      createdAt: now.toISOString(),
      completed: false
    };

    const data = await this.loadData();
    data.reminders.push(reminder);
    if (!(await this.persist(data))) {
      data.reminders.pop();
      return fail('save_failed', 'save_failed', '保存提醒失败');
    }

    return ok(
      `reminder_set: ${reminder.id}`,
      `提醒 '${title}' 已设置到 ${formatChineseDate(datetime)} ${formatClock(datetime)}`
    );
  }

  private async getReminders(): Promise<ToolOutcome> {
    const data = await this.loadData();
    const active = data.reminders
      .filter((reminder) => !reminder.completed)
      .sort((a, b) => a.datetime.localeCompare(b.datetime));
    if (active.length === 0) {
      return ok('no_active_reminders', '没有活跃的提醒');
    }

    const lines = [`您有 ${active.length} 个活跃提醒:`];
    active.forEach((reminder, index) => {
      const time = new Date(reminder.datetime);
      lines.push(`${index + 1}. ${reminder.title} - ${formatChineseDate(time).slice(5)} ${formatClock(time)}`);
      if (reminder.message !== '') {
        lines.push(`   备注: ${reminder.message}`);
      }
    });
    return ok(`reminders_found: ${active.length}`, lines.join('\n'));
  }

  private getDateInfo(entities: Entities): ToolOutcome {
    const now = this.clock();
    const dateText = entityString(entities, 'date') ?? entityString(entities, 'day');
    const target = dateText ? parseDay(dateText, now) : now;
    if (!target) {
      return fail('invalid_date_format', 'invalid_date_format', '日期格式错误，请使用YYYY-MM-DD格式');
    }

    const diff = daysBetween(now, target);
    const lines = [
      `${formatChineseDate(target)} 日期信息:`,
      `星期: ${weekdayName(target)}`,
      `一年中的第 ${dayOfYear(target)} 天`,
      diff === 0 ? '就是今天' : diff > 0 ? `距离今天还有 ${diff} 天` : `距离今天已过去 ${Math.abs(diff)} 天`
    ];
    return ok(`date_info_retrieved: ${formatIsoDate(target)}`, lines.join('\n'));
  }

  /**
   * `datetime` (rule capture or LLM argument), or `date` with optional `time`
   */
  private dateTimeText(entities: Entities): string | undefined {
    const datetime = entityString(entities, 'datetime');
    if (datetime) {
      return datetime;
    }
    const date = entityString(entities, 'date');
    const time = entityString(entities, 'time');
    if (!date) {
      return undefined;
    }
    return time ? `${date} ${time}` : date;
  }

  private async eventsOn(day: Date): Promise<CalendarEvent[]> {
    const data = await this.loadData();
    return data.events
      .filter((event) => isSameDay(new Date(event.datetime), day))
      .sort((a, b) => a.datetime.localeCompare(b.datetime));
  }

  private describeEvents(events: readonly CalendarEvent[], withDescription: boolean): string {
    const lines: string[] = [];
    events.forEach((event, index) => {
      lines.push(`${index + 1}. ${event.title} - ${formatClock(new Date(event.datetime))}`);
      if (event.location !== '') {
        lines.push(`   地点: ${event.location}`);
      }
      if (withDescription && event.description !== '') {
        lines.push(`   描述: ${event.description}`);
      }
    });
    return lines.join('\n');
  }

  private async loadData(): Promise<CalendarData> {
    if (!this.data) {
      this.data = await this.store.load();
    }
    return this.data;
  }

  private async persist(data: CalendarData): Promise<boolean> {
    try {
      await this.store.save(data);
      return true;
    } catch (error) {
      logger.error('Failed to save calendar data', {
        error: extractErrorDetails(error).message,
        code: isAssistantError(error) ? error.code : undefined
      });
      return false;
    }
  }
}
