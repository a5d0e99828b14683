/**
 * Unit tests for WebTool
 */

import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import { WebTool, extractText, normalizeUrl } from '../../../tools/WebTool';
import { HttpRequestError } from '../../../errors/AssistantErrors';
import { FakeHttpClient } from '../../utils/fakes';

describe('normalizeUrl', () => {
  it('should add https to bare hosts only', () => {
    expect(normalizeUrl('example.test')).toBe('https://example.test');
    expect(normalizeUrl('http://example.test/a')).toBe('http://example.test/a');
  });
});

describe('extractText', () => {
  it('should drop scripts, styles and tags', () => {
    const html = '<html><head><style>p { color: red; }</style></head>' +
      '<body><h1>Hello</h1><script>track()</script><p>World\n  wide</p></body></html>';

    expect(extractText(html)).toBe('Hello World wide');
  });
});

describe('WebTool', () => {
  let http: FakeHttpClient;
  let downloadDir: string;
  let tool: WebTool;

  beforeEach(async () => {
    http = new FakeHttpClient();
    downloadDir = await fs.mkdtemp(path.join(os.tmpdir(), 'downloads-'));
    tool = new WebTool({ http, downloadDir, ipLookupBase: 'http://ip.test/json/' });
  });

  afterEach(async () => {
    await fs.rm(downloadDir, { recursive: true, force: true });
  });

  it('should ask for a missing url', async () => {
    await expect(tool.execute('http_get', {}, '')).resolves.toEqual({
      kind: 'clarification_needed',
      reason: 'missing_url',
      prompt: '缺少必需的参数: url'
    });
  });

  it('should preview a JSON response', async () => {
    http.on('https://example.test/', { body: { ok: true }, headers: { 'content-type': 'application/json' } });

    await expect(tool.execute('http_get', { url: 'example.test' }, '')).resolves.toEqual({
      kind: 'ok',
      detail: 'http_get_success: 200',
      speech: 'GET请求成功，返回JSON数据: {\n  "ok": true\n}'
    });
  });

  it('should report an error status', async () => {
    http.on('https://example.test/', { status: 500 });

    await expect(tool.execute('http_get', { url: 'https://example.test/' }, '')).resolves.toEqual({
      kind: 'error',
      code: 'http_status_error',
      message: 'HTTP 500',
      speech: 'GET请求失败: HTTP 500'
    });
  });

  it('should report a request that got no response', async () => {
    http.on('https://example.test/', { error: HttpRequestError.create('https://example.test/', false) });

    await expect(tool.execute('http_get', { url: 'https://example.test/' }, '')).resolves.toEqual({
      kind: 'error',
      code: 'request_failed',
      message: 'Request to https://example.test/ failed',
      speech: '网络操作失败: Request to https://example.test/ failed'
    });
  });

  it('should extract and truncate page text', async () => {
    http.on('https://example.test/page', { body: '<h1>Hello</h1><p>World</p>' });

    await expect(tool.execute('get_webpage_content', { url: 'https://example.test/page', max_length: 5 }, '')).resolves.toEqual({
      kind: 'ok',
      detail: 'webpage_content_retrieved: https://example.test/page',
      speech: '网页内容获取成功:\nHello...'
    });
  });

  it('should check a site with a HEAD request', async () => {
    http.on('https://up.test/', { status: 200 });

    await expect(tool.execute('check_website', { url: 'https://up.test/' }, '')).resolves.toEqual({
      kind: 'ok',
      detail: 'website_status_ok: 200',
      speech: '网站 https://up.test/ 正常运行 (状态码: 200)'
    });
    expect(http.requests[0].options.method).toBe('HEAD');

    await expect(tool.execute('check_website_status', { url: 'https://down.test/' }, '')).resolves.toMatchObject({
      detail: 'website_status_error: 404'
    });
  });

  it('should save a download under the download folder', async () => {
    http.on('https://files.test/docs/report.txt', { body: 'quarterly numbers' });

    const outcome = await tool.execute('download_file', { url: 'https://files.test/docs/report.txt' }, '');
    const target = path.resolve(downloadDir, 'report.txt');

    expect(outcome).toEqual({
      kind: 'ok',
      detail: `file_downloaded: ${target}`,
      speech: `文件下载完成: ${target} (17 字节)`
    });
    await expect(fs.readFile(target, 'utf8')).resolves.toBe('quarterly numbers');
  });

  it('should keep a requested file name inside the download folder', async () => {
    http.on('https://files.test/data', { body: 'x' });

    await tool.execute('download_file', { url: 'https://files.test/data', path: '../outside.txt' }, '');

    await expect(fs.readFile(path.join(downloadDir, 'outside.txt'), 'utf8')).resolves.toBe('x');
  });

  it('should describe an IP address', async () => {
    http.on('http://ip.test/json/192.0.2.10', {
      body: {
        status: 'success',
        query: '192.0.2.10',
        country: 'Testland',
        regionName: 'North',
        city: 'Sampleton',
        isp: 'Example ISP',
        timezone: 'UTC'
      }
    });

    await expect(tool.execute('get_ip_info', { ip_address: '192.0.2.10' }, '')).resolves.toEqual({
      kind: 'ok',
      detail: 'ip_info_retrieved: 192.0.2.10',
      speech: 'IP信息:\nIP地址: 192.0.2.10\n国家: Testland\n地区: North\n城市: Sampleton\nISP: Example ISP\n时区: UTC'
    });
  });

  it('should report a failed IP lookup', async () => {
    http.on('http://ip.test/json/', { body: { status: 'fail', message: 'reserved range' } });

    await expect(tool.execute('get_ip_info', {}, '')).resolves.toEqual({
      kind: 'error',
      code: 'ip_lookup_failed',
      message: 'reserved range',
      speech: '获取IP信息失败: reserved range'
    });
  });
});
