/**
 * Database Management MCP Tools
 *
 * Tools: onto_db_create, onto_db_list, onto_db_select, onto_db_delete
 *
 * @module tools/database
 */

import { z } from 'zod';
import { DatabaseService } from '../services/storage/database/index.js';
import { state, selectDatabase, createDatabase, deleteDatabase } from '../server/state.js';
import { successResult } from '../server/types.js';
import {
  validateInput,
  DatabaseCreateInput,
  DatabaseListInput,
  DatabaseSelectInput,
  DatabaseDeleteInput,
} from '../utils/validation.js';
import { formatResponse, handleError, type ToolResponse, type ToolDefinition } from './shared.js';

export async function handleDatabaseCreate(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(DatabaseCreateInput, params);
    const db = createDatabase(input.name, input.description, input.storage_path);

    return formatResponse(
      successResult({
        name: input.name,
        path: db.getPath(),
        created: true,
        selected: true,
        description: input.description,
      })
    );
  } catch (error) {
    return handleError(error);
  }
}

export async function handleDatabaseList(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(DatabaseListInput, params);
    const storagePath = state.config.defaultStoragePath;
    const databases = DatabaseService.list(storagePath);

    const items = databases.map((info) => {
      if (!input.include_stats) return info;
      // The selected database is already open; reuse its connection
      if (state.currentDatabase && state.currentDatabaseName === info.name) {
        return { ...info, stats: state.currentDatabase.getStats() };
      }
      const db = DatabaseService.open(info.name, storagePath);
      try {
        return { ...info, stats: db.getStats() };
      } finally {
        db.close();
      }
    });

    return formatResponse(
      successResult({
        databases: items,
        total: items.length,
        storage_path: storagePath,
        current_database: state.currentDatabaseName,
      })
    );
  } catch (error) {
    return handleError(error);
  }
}

export async function handleDatabaseSelect(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(DatabaseSelectInput, params);
    const db = selectDatabase(input.database_name);

    return formatResponse(
      successResult({
        name: input.database_name,
        path: db.getPath(),
        selected: true,
        stats: db.getStats(),
      })
    );
  } catch (error) {
    return handleError(error);
  }
}

export async function handleDatabaseDelete(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(DatabaseDeleteInput, params);
    deleteDatabase(input.database_name);

    return formatResponse(successResult({ name: input.database_name, deleted: true }));
  } catch (error) {
    return handleError(error);
  }
}

export const databaseTools: Record<string, ToolDefinition> = {
  onto_db_create: {
    description: 'Create a new ontology database and select it',
    inputSchema: {
      name: z.string().min(1).max(64).describe('Database name (letters, digits, underscores, hyphens)'),
      description: z.string().max(500).optional().describe('Optional description'),
      storage_path: z.string().optional().describe('Directory for the database file'),
    },
    handler: handleDatabaseCreate,
  },
  onto_db_list: {
    description: 'List ontology databases in the storage directory',
    inputSchema: {
      include_stats: z.boolean().default(false).describe('Include file, proposal and ontology counts'),
    },
    handler: handleDatabaseList,
  },
  onto_db_select: {
    description: 'Select the database that subsequent tools operate on',
    inputSchema: {
      database_name: z.string().min(1).describe('Name of the database to select'),
    },
    handler: handleDatabaseSelect,
  },
  onto_db_delete: {
    description: 'Delete a database and its files permanently',
    inputSchema: {
      database_name: z.string().min(1).describe('Name of the database to delete'),
      confirm: z.literal(true).describe('Must be true to confirm deletion'),
    },
    handler: handleDatabaseDelete,
  },
};
