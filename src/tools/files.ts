/**
 * File MCP Tools
 *
 * Tools: onto_file_list, onto_file_delete
 *
 * @module tools/files
 */

import { z } from 'zod';
import { requireDatabase } from '../server/state.js';
import { successResult } from '../server/types.js';
import { fileNotFoundError } from '../server/errors.js';
import { validateInput, FileListInput, FileDeleteInput } from '../utils/validation.js';
import { formatResponse, handleError, type ToolResponse, type ToolDefinition } from './shared.js';

export async function handleFileList(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    validateInput(FileListInput, params);
    const files = requireDatabase().listFiles();
    return formatResponse(successResult({ files, total: files.length }));
  } catch (error) {
    return handleError(error);
  }
}

export async function handleFileDelete(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(FileDeleteInput, params);
    const result = requireDatabase().deleteFile(input.file_id);
    if (!result) {
      throw fileNotFoundError(input.file_id);
    }
    return formatResponse(successResult({ ...result, deleted: true }));
  } catch (error) {
    return handleError(error);
  }
}

export const fileTools: Record<string, ToolDefinition> = {
  onto_file_list: {
    description: 'List ingested files with their status in upload order',
    inputSchema: {},
    handler: handleFileList,
  },
  onto_file_delete: {
    description: 'Delete an ingested file with its chunks and the proposals extracted from it',
    inputSchema: {
      file_id: z.string().min(1).describe('File ID'),
    },
    handler: handleFileDelete,
  },
};
