/**
 * @fileoverview Web Tool
 *
 * GET requests, page text extraction, site status checks, downloads into
 * `tools.downloadDir` and public IP lookups.
 */

import * as path from 'path';
import { promises as fs } from 'fs';
import { BaseTool } from './BaseTool';
import { fail, ok } from './outcome';
import { IntentSchema, ToolOutcome } from './types';
import { HttpClient, HttpResponse, responseJson, responseText } from './HttpClient';
import { Entities } from '../intent/types';
import { entityString } from '../intent/entities';
import { isBoolean, isObject, isString, toInteger } from '../types/TypeGuards';
import { errorMessage, HttpRequestError } from '../errors/AssistantErrors';
import logger from '../utils/logger';

const DEFAULT_IP_LOOKUP = 'http://ip-api.com/json';
const PREVIEW_LENGTH = 500;

export interface WebToolOptions {
  http: HttpClient;
  downloadDir: string;
  /** ip-api.com compatible endpoint */
  ipLookupBase?: string;
}

/**
 * Add https:// to bare host names such as "example.com"
 */
export function normalizeUrl(value: string): string {
  return /^[a-z][a-z0-9+.-]*:\/\//i.test(value) ? value : `https://${value}`;
}

/**
 * Strip tags and collapse whitespace
 */
export function extractText(html: string): string {
  return html
    .replace(/<(script|style)[^>]*>[\s\S]*?<\/\1>/gi, ' ')
    .replace(/<[^>]+>/g, ' ')
    .replace(/\s+/g, ' ')
    .trim();
}

function truncate(text: string, maxLength: number): string {
  return text.length > maxLength ? `${text.slice(0, maxLength)}...` : text;
}

export class WebTool extends BaseTool {
  readonly name = 'web';
  readonly description = '提供HTTP请求、网页内容获取、网站状态检查、文件下载等功能';

  private readonly http: HttpClient;
  private readonly downloadDir: string;
  private readonly ipLookupBase: string;

  constructor(options: WebToolOptions) {
    super();
    this.http = options.http;
    this.downloadDir = options.downloadDir;
    this.ipLookupBase = (options.ipLookupBase ?? DEFAULT_IP_LOOKUP).replace(/\/+$/, '');
  }

  getSupportedIntents(): readonly string[] {
    return ['http_get', 'get_webpage_content', 'check_website_status', 'check_website', 'download_file', 'get_ip_info'];
  }

  getKeywords(): readonly string[] {
    return ['网站', '网页', '下载', '链接', 'IP'];
  }

  getIntentSchemas(): readonly IntentSchema[] {
    const url = { type: 'string' as const, description: 'Absolute URL or host name' };
    return [
      { intent: 'http_get', description: 'Send a GET request and report the status', parameters: { url }, required: ['url'] },
      {
        intent: 'get_webpage_content',
        description: 'Read the visible text of a web page',
        parameters: {
          url,
          max_length: { type: 'integer', description: 'Characters to read, default 1000' },
          extract_text: { type: 'boolean', description: 'Strip HTML tags, default true' }
        },
        required: ['url']
      },
      { intent: 'check_website_status', description: 'Check whether a website responds', parameters: { url }, required: ['url'] },
      { intent: 'check_website', description: 'Check whether a website responds', parameters: { url }, required: ['url'] },
      {
        intent: 'download_file',
        description: 'Download a file into the download folder',
        parameters: { url, path: { type: 'string', description: 'File name to save as' } },
        required: ['url']
      },
      {
        intent: 'get_ip_info',
        description: 'Location and ISP of an IP address, or of this machine',
        parameters: { ip_address: { type: 'string', description: 'IP address, default the public address' } }
      }
    ];
  }

  protected async handle(intent: string, entities: Entities): Promise<ToolOutcome> {
    if (intent === 'get_ip_info') {
      return this.getIpInfo(entities);
    }

    const missing = this.requireEntities(entities, ['url']);
    if (missing) {
      return missing;
    }
    const url = normalizeUrl(entityString(entities, 'url') ?? '');

    try {
      switch (intent) {
        case 'http_get':
          return await this.httpGet(url);
        case 'get_webpage_content':
          return await this.getWebpageContent(url, entities);
        case 'check_website_status':
        case 'check_website':
          return await this.checkWebsite(url);
        case 'download_file':
          return await this.downloadFile(url, entities);
        default:
          return fail('unsupported_operation', `unsupported_operation: ${intent}`);
      }
    } catch (error) {
      const message = errorMessage(error);
      logger.warn('Web operation failed', { intent, url, error: message });
      const code = error instanceof HttpRequestError ? 'request_failed' : 'web_operation_failed';
      return fail(code, message, `网络操作失败: ${message}`);
    }
  }

  private async httpGet(url: string): Promise<ToolOutcome> {
    const response = await this.http.request(url);
    if (!response.ok) {
      return this.statusFailure(response, 'GET请求失败');
    }

    const contentType = response.headers['content-type'] ?? '';
    let speech = `GET请求成功，状态码: ${response.status}，内容长度: ${response.body.length}`;
    if (contentType.includes('application/json')) {
      try {
        speech = `GET请求成功，返回JSON数据: ${truncate(JSON.stringify(responseJson(response), null, 2), PREVIEW_LENGTH)}`;
      } catch (error) {
        logger.debug('JSON content type with a non-JSON body', { url, error: errorMessage(error) });
      }
    }
    return ok(`http_get_success: ${response.status}`, speech);
  }

  private async getWebpageContent(url: string, entities: Entities): Promise<ToolOutcome> {
    const maxLength = Math.max(1, toInteger(entities.max_length) ?? 1000);
    const strip = isBoolean(entities.extract_text) ? entities.extract_text : true;

    const response = await this.http.request(url);
    if (!response.ok) {
      return this.statusFailure(response, '获取网页内容失败');
    }

    const raw = responseText(response);
    const content = truncate(strip ? extractText(raw) : raw, maxLength);
    return ok(`webpage_content_retrieved: ${url}`, `网页内容获取成功:\n${content}`);
  }

  private async checkWebsite(url: string): Promise<ToolOutcome> {
    const response = await this.http.request(url, { method: 'HEAD' });
    if (response.status === 200) {
      return ok(`website_status_ok: ${response.status}`, `网站 ${url} 正常运行 (状态码: ${response.status})`);
    }
    return ok(`website_status_error: ${response.status}`, `网站 ${url} 状态异常 (状态码: ${response.status})`);
  }

  private async downloadFile(url: string, entities: Entities): Promise<ToolOutcome> {
    const response = await this.http.request(url);
    if (!response.ok) {
      return this.statusFailure(response, '文件下载失败');
    }

    const requested = entityString(entities, 'path') ?? entityString(entities, 'save_path');
    const fromUrl = path.posix.basename(new URL(url).pathname);
    const fileName = path.basename(requested ?? (fromUrl !== '' ? fromUrl : 'download'));
    const target = path.resolve(this.downloadDir, fileName);

    await fs.mkdir(path.dirname(target), { recursive: true });
    await fs.writeFile(target, response.body);

    const total = toInteger(response.headers['content-length']);
    const size = total !== undefined && total > 0
      ? `${response.body.length}/${total} 字节`
      : `${response.body.length} 字节`;
    return ok(`file_downloaded: ${target}`, `文件下载完成: ${target} (${size})`);
  }

  private async getIpInfo(entities: Entities): Promise<ToolOutcome> {
    const ip = entityString(entities, 'ip_address');
    const url = ip ? `${this.ipLookupBase}/${encodeURIComponent(ip)}` : `${this.ipLookupBase}/`;

    try {
      const body = responseJson(await this.http.request(url));
      const data = isObject(body) ? body : {};
      if (data.status !== 'success') {
        const message = isString(data.message) ? data.message : 'ip_lookup_failed';
        return fail('ip_lookup_failed', message, `获取IP信息失败: ${message}`);
      }

      const field = (key: string): string => {
        const value = data[key];
        return isString(value) ? value : '未知';
      };
      const lines = [
        'IP信息:',
        `IP地址: ${field('query')}`,
        `国家: ${field('country')}`,
        `地区: ${field('regionName')}`,
        `城市: ${field('city')}`,
        `ISP: ${field('isp')}`,
        `时区: ${field('timezone')}`
      ];
      return ok(`ip_info_retrieved: ${field('query')}`, lines.join('\n'));
    } catch (error) {
      const message = errorMessage(error);
      return fail('ip_lookup_failed', message, `获取IP信息失败: ${message}`);
    }
  }

  private statusFailure(response: HttpResponse, speech: string): ToolOutcome {
    return fail('http_status_error', `HTTP ${response.status}`, `${speech}: HTTP ${response.status}`);
  }
}
