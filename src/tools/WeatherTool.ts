/**
 * @fileoverview Weather Tool
 *
 * Current weather, forecast and air quality from the OpenWeatherMap API.
 * The city comes from the `city` entity (LLM arguments) or `location` (rule
 * captures) and defaults to 北京.
 */

import { BaseTool } from './BaseTool';
import { fail, ok } from './outcome';
import { IntentSchema, ToolOutcome } from './types';
import { HttpClient, QueryParams, responseJson } from './HttpClient';
import { Entities } from '../intent/types';
import { entityString } from '../intent/entities';
import { isArray, isNumber, isObject, isString, toInteger } from '../types/TypeGuards';
import { errorMessage, extractErrorDetails, HttpRequestError } from '../errors/AssistantErrors';
import logger from '../utils/logger';

export const DEFAULT_CITY = '北京';

const AQI_LEVELS: Record<number, string> = {
  1: '优秀',
  2: '良好',
  3: '中等',
  4: '较差',
  5: '很差'
};

const AIR_COMPONENTS: Array<[string, string]> = [
  ['co', 'CO'],
  ['no', 'NO'],
  ['no2', 'NO2'],
  ['o3', 'O3'],
  ['so2', 'SO2'],
  ['pm2_5', 'PM2.5'],
  ['pm10', 'PM10']
];

export interface WeatherToolOptions {
  apiKey?: string;
  /** e.g. http://api.openweathermap.org */
  apiBase: string;
  http: HttpClient;
}

type Lookup = { ok: true; data: Record<string, unknown> } | { ok: false; outcome: ToolOutcome };

function numberAt(source: Record<string, unknown>, key: string): number | undefined {
  const value = source[key];
  return isNumber(value) ? value : undefined;
}

function objectAt(source: Record<string, unknown>, key: string): Record<string, unknown> {
  const value = source[key];
  return isObject(value) ? value : {};
}

function firstDescription(source: Record<string, unknown>): string {
  const weather = source.weather;
  const first: unknown = isArray(weather) ? weather[0] : undefined;
  if (isObject(first) && isString(first.description)) {
    return first.description;
  }
  return '未知';
}

export class WeatherTool extends BaseTool {
  readonly name = 'weather';
  readonly description = '提供天气查询、天气预报、空气质量等功能';

  private readonly apiKey?: string;
  private readonly apiBase: string;
  private readonly http: HttpClient;

  constructor(options: WeatherToolOptions) {
    super();
    this.apiKey = options.apiKey;
    this.apiBase = options.apiBase.replace(/\/+$/, '');
    this.http = options.http;
  }

  getSupportedIntents(): readonly string[] {
    return ['get_weather', 'get_weather_forecast', 'get_air_quality'];
  }

  getKeywords(): readonly string[] {
    return ['天气', '气温', '预报', '空气', '下雨'];
  }

  getIntentSchemas(): readonly IntentSchema[] {
    const city = { type: 'string' as const, description: 'City name, defaults to 北京' };
    return [
      {
        intent: 'get_weather',
        description: 'Current weather for a city',
        parameters: {
          city,
          units: { type: 'string', description: 'Unit system', enum: ['metric', 'imperial', 'standard'] }
        }
      },
      {
        intent: 'get_weather_forecast',
        description: 'Daily forecast for the next days',
        parameters: { city, days: { type: 'integer', description: 'Number of days (1-5), default 5' } }
      },
      {
        intent: 'get_air_quality',
        description: 'Air quality index and pollutant concentrations',
        parameters: { city }
      }
    ];
  }

  validateConfiguration(): boolean {
    return this.apiKey !== undefined && this.apiKey !== '';
  }

  protected async handle(intent: string, entities: Entities): Promise<ToolOutcome> {
    if (!this.validateConfiguration()) {
      return fail('missing_api_key', 'missing_api_key', '请在配置文件中设置天气API密钥');
    }

    const city = entityString(entities, 'city') ?? entityString(entities, 'location') ?? DEFAULT_CITY;
    switch (intent) {
      case 'get_weather':
        return this.getWeather(city, entityString(entities, 'units') ?? 'metric');
      case 'get_weather_forecast':
        return this.getForecast(city, toInteger(entities.days) ?? 5);
      case 'get_air_quality':
        return this.getAirQuality(city);
      default:
        return fail('unsupported_operation', `unsupported_operation: ${intent}`);
    }
  }

  private async getWeather(city: string, units: string): Promise<ToolOutcome> {
    const lookup = await this.fetchJson('/data/2.5/weather', { q: city, units, lang: 'zh_cn' }, '获取天气信息失败');
    if (!lookup.ok) {
      return lookup.outcome;
    }

    const data = lookup.data;
    const main = objectAt(data, 'main');
    const wind = objectAt(data, 'wind');
    const lines = [
      `${city}当前天气:`,
      `天气: ${firstDescription(data)}`,
      `温度: ${numberAt(main, 'temp') ?? 'N/A'}°C`,
      `体感温度: ${numberAt(main, 'feels_like') ?? 'N/A'}°C`,
      `湿度: ${numberAt(main, 'humidity') ?? 'N/A'}%`,
      `气压: ${numberAt(main, 'pressure') ?? 'N/A'} hPa`
    ];
    const speed = numberAt(wind, 'speed');
    if (speed !== undefined) {
      lines.push(`风速: ${speed} m/s`);
    }
    const degree = numberAt(wind, 'deg');
    if (degree !== undefined) {
      lines.push(`风向: ${degree}°`);
    }
    const visibility = numberAt(data, 'visibility');
    if (visibility !== undefined) {
      lines.push(`能见度: ${visibility / 1000} km`);
    }

    return ok(`weather_retrieved: ${city}`, lines.join('\n'));
  }

  private async getForecast(city: string, requestedDays: number): Promise<ToolOutcome> {
    const days = Math.max(1, Math.min(5, requestedDays));
    const lookup = await this.fetchJson('/data/2.5/forecast', { q: city, units: 'metric', lang: 'zh_cn' }, '获取天气预报失败');
    if (!lookup.ok) {
      return lookup.outcome;
    }

    const entries = isArray(lookup.data.list) ? lookup.data.list.filter(isObject) : [];
    const byDate = new Map<string, { temps: number[]; descriptions: string[] }>();
    for (const entry of entries) {
      const timestamp = numberAt(entry, 'dt');
      const temp = numberAt(objectAt(entry, 'main'), 'temp');
      if (timestamp === undefined || temp === undefined) {
        continue;
      }
      const date = new Date(timestamp * 1000);
      const key = `${String(date.getMonth() + 1).padStart(2, '0')}月${String(date.getDate()).padStart(2, '0')}日`;
      const bucket = byDate.get(key) ?? { temps: [], descriptions: [] };
      bucket.temps.push(temp);
      bucket.descriptions.push(firstDescription(entry));
      byDate.set(key, bucket);
    }

    const lines = [`${city}未来${days}天天气预报:`];
    for (const [date, bucket] of [...byDate.entries()].slice(0, days)) {
      lines.push(
        `${date}: ${mostCommon(bucket.descriptions)}, ` +
        `${Math.round(Math.min(...bucket.temps))}°C - ${Math.round(Math.max(...bucket.temps))}°C`
      );
    }

    return ok(`weather_forecast_retrieved: ${city}`, lines.join('\n'));
  }

  private async getAirQuality(city: string): Promise<ToolOutcome> {
    const geo = await this.fetchJson('/geo/1.0/direct', { q: city, limit: 1 }, '获取城市坐标失败');
    if (!geo.ok) {
      return geo.outcome;
    }
    const place = isArray(geo.data.results) ? geo.data.results[0] : undefined;
    const lat = isObject(place) ? numberAt(place, 'lat') : undefined;
    const lon = isObject(place) ? numberAt(place, 'lon') : undefined;
    if (lat === undefined || lon === undefined) {
      return fail('city_not_found', `city_not_found: ${city}`, `未找到城市: ${city}`);
    }

    const air = await this.fetchJson('/data/2.5/air_pollution', { lat, lon }, '获取空气质量失败');
    if (!air.ok) {
      return air.outcome;
    }
    const reading = isArray(air.data.list) ? air.data.list[0] : undefined;
    if (!isObject(reading)) {
      return fail('no_air_quality_data', 'no_air_quality_data', `无法获取${city}的空气质量数据`);
    }

    const aqi = numberAt(objectAt(reading, 'main'), 'aqi');
    const components = objectAt(reading, 'components');
    const lines = [
      `${city}空气质量:`,
      `空气质量指数: ${aqi ?? 'N/A'} (${(aqi !== undefined ? AQI_LEVELS[aqi] : undefined) ?? '未知'})`,
      ...AIR_COMPONENTS.map(([key, label]) => `${label}: ${numberAt(components, key) ?? 'N/A'} μg/m³`)
    ];

    return ok(`air_quality_retrieved: ${city}`, lines.join('\n'));
  }

  /**
   * GET a JSON resource. Arrays are wrapped as `{results: [...]}`.
   */
  private async fetchJson(path: string, params: QueryParams, failureSpeech: string): Promise<Lookup> {
    try {
      const response = await this.http.request(`${this.apiBase}${path}`, {
        params: { ...params, appid: this.apiKey }
      });
      const body = responseJson(response);
      const data = isArray(body) ? { results: body } : isObject(body) ? body : {};

      if (!response.ok) {
        const message = isString(data.message) ? data.message : `HTTP ${response.status}`;
        return { ok: false, outcome: fail('weather_api_error', message, `${failureSpeech}: ${message}`) };
      }
      return { ok: true, data };
    } catch (error) {
      const message = errorMessage(error);
      logger.warn('Weather request failed', { path, error: extractErrorDetails(error).message });
      const code = error instanceof HttpRequestError ? 'weather_request_failed' : 'weather_api_error';
      return { ok: false, outcome: fail(code, message, `天气API请求失败: ${message}`) };
    }
  }
}

function mostCommon(values: readonly string[]): string {
  const counts = new Map<string, number>();
  let best = values[0] ?? '未知';
  let bestCount = 0;
  for (const value of values) {
    const count = (counts.get(value) ?? 0) + 1;
    counts.set(value, count);
    if (count > bestCount) {
      best = value;
      bestCount = count;
    }
  }
  return best;
}
