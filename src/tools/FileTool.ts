/**
 * @fileoverview File Tool
 *
 * File and folder operations. Relative paths resolve against the configured
 * workspace directory; results echo the path as the user gave it.
 */

import { promises as fs, Dirent } from 'fs';
import * as path from 'path';
import { BaseTool } from './BaseTool';
import { clarify, fail, ok } from './outcome';
import { IntentSchema, ToolOutcome } from './types';
import { Entities } from '../intent/types';
import { entityBoolean, entityString } from '../intent/entities';
import { isNodeSystemError, toInteger } from '../types/TypeGuards';
import { errorMessage } from '../errors/AssistantErrors';
import logger from '../utils/logger';

const DEFAULT_READ_LENGTH = 500;
const MAX_SEARCH_RESULTS = 10;
const MAX_SEARCH_ENTRIES = 5000;
const LISTING_PREVIEW = 5;

/**
 * Glob-style pattern (`*`, `?`) to a case-insensitive regular expression.
 * A pattern without wildcards matches names containing it.
 */
export function wildcardToRegExp(pattern: string): RegExp {
  const escaped = pattern.replace(/[.+^${}()|[\]\\]/g, '\\$&');
  if (!/[*?]/.test(pattern)) {
    return new RegExp(escaped, 'i');
  }
  return new RegExp(`^${escaped.replace(/\*/g, '.*').replace(/\?/g, '.')}$`, 'i');
}

async function exists(target: string): Promise<boolean> {
  try {
    await fs.access(target);
    return true;
  } catch {
    return false;
  }
}

function preview(names: readonly string[]): string {
  const shown = names.slice(0, LISTING_PREVIEW).join(', ');
  return names.length > LISTING_PREVIEW ? `${shown} ... 还有 ${names.length - LISTING_PREVIEW} 个` : shown;
}

export class FileTool extends BaseTool {
  readonly name = 'file';
  readonly description = '提供文件和文件夹的创建、删除、复制、移动、搜索等操作';

  constructor(private readonly workspaceDir: string) {
    super();
  }

  getSupportedIntents(): readonly string[] {
    return [
      'create_file',
      'create_folder',
      'delete_file',
      'copy_file',
      'move_file',
      'rename_file',
      'search_files',
      'list_files',
      'read_file',
      'write_file',
      'get_file_info'
    ];
  }

  getKeywords(): readonly string[] {
    return ['文件', '文件夹', '目录', '复制', '移动', '删除'];
  }

  getIntentSchemas(): readonly IntentSchema[] {
    const filePath = { type: 'string' as const, description: 'File path, relative to the workspace' };
    return [
      {
        intent: 'create_file',
        description: 'Create a file with optional content',
        parameters: { file_path: filePath, content: { type: 'string', description: 'Initial content' } },
        required: ['file_path']
      },
      {
        intent: 'create_folder',
        description: 'Create a folder',
        parameters: { folder_path: { type: 'string', description: 'Folder path' } },
        required: ['folder_path']
      },
      { intent: 'delete_file', description: 'Delete a file', parameters: { file_path: filePath }, required: ['file_path'] },
      {
        intent: 'copy_file',
        description: 'Copy a file',
        parameters: {
          source: { type: 'string', description: 'Source path' },
          destination: { type: 'string', description: 'Destination path' }
        },
        required: ['source', 'destination']
      },
      {
        intent: 'move_file',
        description: 'Move a file',
        parameters: {
          source: { type: 'string', description: 'Source path' },
          destination: { type: 'string', description: 'Destination path' }
        },
        required: ['source', 'destination']
      },
      {
        intent: 'rename_file',
        description: 'Rename a file in place',
        parameters: {
          old_name: { type: 'string', description: 'Current path' },
          new_name: { type: 'string', description: 'New file name' }
        },
        required: ['old_name', 'new_name']
      },
      {
        intent: 'search_files',
        description: 'Find files whose name matches a pattern',
        parameters: {
          pattern: { type: 'string', description: 'Name or wildcard pattern such as *.txt' },
          directory: { type: 'string', description: 'Directory to search, default the workspace' }
        },
        required: ['pattern']
      },
      {
        intent: 'list_files',
        description: 'List the files and folders in a directory',
        parameters: { directory: { type: 'string', description: 'Directory, default the workspace' } }
      },
      {
        intent: 'read_file',
        description: 'Read the start of a text file',
        parameters: { file_path: filePath, max_length: { type: 'integer', description: 'Characters to read, default 500' } },
        required: ['file_path']
      },
      {
        intent: 'write_file',
        description: 'Write or append text to a file',
        parameters: {
          file_path: filePath,
          content: { type: 'string', description: 'Text to write' },
          append: { type: 'boolean', description: 'Append instead of overwrite' }
        },
        required: ['file_path', 'content']
      },
      { intent: 'get_file_info', description: 'Size, type and modification time', parameters: { file_path: filePath }, required: ['file_path'] }
    ];
  }

  protected async handle(intent: string, entities: Entities): Promise<ToolOutcome> {
    try {
      switch (intent) {
        case 'create_file':
          return await this.createFile(entities);
        case 'create_folder':
          return await this.createFolder(entities);
        case 'delete_file':
          return await this.deleteFile(entities);
        case 'copy_file':
          return await this.transfer(entities, 'copy');
        case 'move_file':
          return await this.transfer(entities, 'move');
        case 'rename_file':
          return await this.renameFile(entities);
        case 'search_files':
          return await this.searchFiles(entities);
        case 'list_files':
          return await this.listFiles(entities);
        case 'read_file':
          return await this.readFile(entities);
        case 'write_file':
          return await this.writeFile(entities);
        case 'get_file_info':
          return await this.getFileInfo(entities);
        default:
          return fail('unsupported_operation', `unsupported_operation: ${intent}`);
      }
    } catch (error) {
      const message = errorMessage(error);
      logger.warn('File operation failed', { intent, error: message });
      const code = isNodeSystemError(error) && error.code ? error.code.toLowerCase() : 'file_operation_failed';
      return fail(code, message, `文件操作失败: ${message}`);
    }
  }

  /**
   * `file_path` from the LLM, or `path` / `filename` (optionally inside
   * `path`) from rule captures
   */
  private filePathOf(entities: Entities): string | undefined {
    const explicit = entityString(entities, 'file_path');
    if (explicit) {
      return explicit;
    }
    const filename = entityString(entities, 'filename');
    const directory = entityString(entities, 'path');
    if (filename) {
      return directory ? path.join(directory, filename) : filename;
    }
    return directory;
  }

  private resolve(userPath: string): string {
    return path.resolve(this.workspaceDir, userPath);
  }

  private async createFile(entities: Entities): Promise<ToolOutcome> {
    const filePath = this.filePathOf(entities);
    if (!filePath) {
      return clarify('file_path_missing', '请告诉我要创建的文件名');
    }
    const target = this.resolve(filePath);
    await fs.mkdir(path.dirname(target), { recursive: true });
    await fs.writeFile(target, entityString(entities, 'content') ?? '', 'utf8');
    return ok(`file_created: ${filePath}`, `文件已创建: ${filePath}`);
  }

  private async createFolder(entities: Entities): Promise<ToolOutcome> {
    const folderPath = entityString(entities, 'folder_path') ?? entityString(entities, 'directory');
    if (!folderPath) {
      return clarify('folder_path_missing', '请告诉我要创建的文件夹名称');
    }
    await fs.mkdir(this.resolve(folderPath), { recursive: true });
    return ok(`folder_created: ${folderPath}`, `文件夹已创建: ${folderPath}`);
  }

  private async deleteFile(entities: Entities): Promise<ToolOutcome> {
    const filePath = this.filePathOf(entities);
    if (!filePath) {
      return clarify('file_path_missing', '请告诉我要删除的文件');
    }
    const target = this.resolve(filePath);
    if (!(await exists(target))) {
      return fail('file_not_found', `file_not_found: ${filePath}`, `文件不存在: ${filePath}`);
    }
    await fs.unlink(target);
    return ok(`file_deleted: ${filePath}`, `文件已删除: ${filePath}`);
  }

  private async transfer(entities: Entities, mode: 'copy' | 'move'): Promise<ToolOutcome> {
    const missing = this.requireEntities(entities, ['source', 'destination']);
    if (missing) {
      return missing;
    }
    const source = entityString(entities, 'source') ?? '';
    const destination = entityString(entities, 'destination') ?? '';
    const from = this.resolve(source);
    if (!(await exists(from))) {
      return fail('source_file_not_found', `source_file_not_found: ${source}`, `源文件不存在: ${source}`);
    }

    let to = this.resolve(destination);
    const destinationStat = await fs.stat(to).catch(() => undefined);
    if (destinationStat?.isDirectory()) {
      to = path.join(to, path.basename(from));
    } else {
      await fs.mkdir(path.dirname(to), { recursive: true });
    }

    if (mode === 'copy') {
      await fs.copyFile(from, to);
      return ok(`file_copied: ${source} -> ${destination}`, `文件已复制: ${source} -> ${destination}`);
    }
    await fs.rename(from, to);
    return ok(`file_moved: ${source} -> ${destination}`, `文件已移动: ${source} -> ${destination}`);
  }

  private async renameFile(entities: Entities): Promise<ToolOutcome> {
    const missing = this.requireEntities(entities, ['old_name', 'new_name']);
    if (missing) {
      return missing;
    }
    const oldName = entityString(entities, 'old_name') ?? '';
    const newName = entityString(entities, 'new_name') ?? '';
    const from = this.resolve(oldName);
    if (!(await exists(from))) {
      return fail('file_not_found', `file_not_found: ${oldName}`, `文件不存在: ${oldName}`);
    }
    await fs.rename(from, path.join(path.dirname(from), path.basename(newName)));
    return ok(`file_renamed: ${oldName} -> ${newName}`, `文件已重命名: ${oldName} -> ${newName}`);
  }

  private async searchFiles(entities: Entities): Promise<ToolOutcome> {
    const pattern = entityString(entities, 'pattern');
    if (!pattern) {
      return clarify('search_pattern_missing', '请告诉我要搜索的文件名');
    }
    const directory = entityString(entities, 'directory') ?? entityString(entities, 'search_path') ?? '.';
    const root = this.resolve(directory);
    const matcher = wildcardToRegExp(pattern);

    const found: string[] = [];
    const pending = [root];
    let visited = 0;
    while (pending.length > 0 && visited < MAX_SEARCH_ENTRIES) {
      const current = pending.shift() ?? root;
      let entries: Dirent[];
      try {
        entries = await fs.readdir(current, { withFileTypes: true });
      } catch (error) {
        logger.debug('Skipping unreadable directory', { directory: current, error: errorMessage(error) });
        continue;
      }
      for (const entry of entries) {
        visited++;
        const full = path.join(current, entry.name);
        if (entry.isDirectory()) {
          pending.push(full);
        } else if (matcher.test(entry.name)) {
          found.push(path.relative(root, full));
        }
      }
    }

    if (found.length === 0) {
      return ok('no_files_found', `未找到匹配模式 '${pattern}' 的文件`);
    }
    found.sort();
    const shown = found.slice(0, MAX_SEARCH_RESULTS).join('\n');
    const more = found.length > MAX_SEARCH_RESULTS ? `\n... 还有 ${found.length - MAX_SEARCH_RESULTS} 个文件` : '';
    return ok(`files_found: ${found.length}`, `找到 ${found.length} 个匹配的文件:\n${shown}${more}`);
  }

  private async listFiles(entities: Entities): Promise<ToolOutcome> {
    const directory = entityString(entities, 'directory') ?? '.';
    const target = this.resolve(directory);
    const stat = await fs.stat(target).catch(() => undefined);
    if (!stat?.isDirectory()) {
      return fail('directory_not_found', `directory_not_found: ${directory}`, `目录不存在: ${directory}`);
    }

    const entries = await fs.readdir(target, { withFileTypes: true });
    const folders = entries.filter((entry) => entry.isDirectory()).map((entry) => entry.name).sort();
    const files = entries.filter((entry) => entry.isFile()).map((entry) => entry.name).sort();

    const lines = [`目录 ${directory} 包含:`];
    if (folders.length > 0) {
      lines.push(`文件夹 (${folders.length}): ${preview(folders)}`);
    }
    if (files.length > 0) {
      lines.push(`文件 (${files.length}): ${preview(files)}`);
    }
    return ok(`directory_listed: ${files.length} files, ${folders.length} folders`, lines.join('\n'));
  }

  private async readFile(entities: Entities): Promise<ToolOutcome> {
    const filePath = this.filePathOf(entities);
    if (!filePath) {
      return clarify('file_path_missing', '请告诉我要读取的文件');
    }
    const target = this.resolve(filePath);
    if (!(await exists(target))) {
      return fail('file_not_found', `file_not_found: ${filePath}`, `文件不存在: ${filePath}`);
    }

    const maxLength = toInteger(entities.max_length) ?? DEFAULT_READ_LENGTH;
    const content = await fs.readFile(target, 'utf8');
    const shown = content.length > maxLength ? `${content.slice(0, maxLength)}... (内容已截断)` : content;
    return ok(`file_read: ${filePath}`, `文件内容:\n${shown}`);
  }

  private async writeFile(entities: Entities): Promise<ToolOutcome> {
    const filePath = this.filePathOf(entities);
    const content = entities.content;
    if (!filePath || typeof content !== 'string') {
      return clarify('write_parameters_missing', '请提供文件路径和要写入的内容');
    }
    const append = entityBoolean(entities, 'append') ?? false;
    const target = this.resolve(filePath);
    await fs.mkdir(path.dirname(target), { recursive: true });
    if (append) {
      await fs.appendFile(target, content, 'utf8');
    } else {
      await fs.writeFile(target, content, 'utf8');
    }
    return ok(`file_written: ${filePath}`, `内容已${append ? '追加到' : '写入'}文件: ${filePath}`);
  }

  private async getFileInfo(entities: Entities): Promise<ToolOutcome> {
    const filePath = this.filePathOf(entities);
    if (!filePath) {
      return clarify('file_path_missing', '请告诉我要查看的文件');
    }
    const stat = await fs.stat(this.resolve(filePath)).catch(() => undefined);
    if (!stat) {
      return fail('file_not_found', `file_not_found: ${filePath}`, `文件不存在: ${filePath}`);
    }

    const lines = [
      '文件信息:',
      `名称: ${path.basename(filePath)}`,
      `大小: ${stat.size} 字节`,
      `类型: ${stat.isDirectory() ? '文件夹' : '文件'}`,
      `修改时间: ${stat.mtime.toISOString()}`
    ];
    return ok(`file_info_retrieved: ${filePath}`, lines.join('\n'));
  }
}
