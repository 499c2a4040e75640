/**
 * DatabaseService class for all database operations
 *
 * Wraps one better-sqlite3 connection to a named ontology store and exposes
 * file, chunk, proposal and ontology operations. Uses prepared statements.
 */

import Database from 'better-sqlite3';
import type { FileStatus, SourceChunk, SourceFile } from '../../../models/file.js';
import type { OntologyGraph, Proposal, ProposalStatus, StoredProposal } from '../../../models/ontology.js';
import type { DatabaseInfo, DatabaseStats } from './types.js';
import {
  createDatabase,
  openDatabase,
  listDatabases,
  deleteDatabase,
  databaseExists,
} from './static-operations.js';
import * as fileOps from './file-operations.js';
import * as proposalOps from './proposal-operations.js';
import * as ontologyOps from './ontology-operations.js';

export class DatabaseService {
  private readonly db: Database.Database;
  private readonly name: string;
  private readonly path: string;

  private constructor(db: Database.Database, name: string, path: string) {
    this.db = db;
    this.name = name;
    this.path = path;
  }

  static create(name: string, description?: string, storagePath?: string): DatabaseService {
    const result = createDatabase(name, description, storagePath);
    return new DatabaseService(result.db, result.name, result.path);
  }

  static open(name: string, storagePath?: string): DatabaseService {
    const result = openDatabase(name, storagePath);
    return new DatabaseService(result.db, result.name, result.path);
  }

  static list(storagePath?: string): DatabaseInfo[] {
    return listDatabases(storagePath);
  }

  static delete(name: string, storagePath?: string): void {
    deleteDatabase(name, storagePath);
  }

  static exists(name: string, storagePath?: string): boolean {
    return databaseExists(name, storagePath);
  }

  getName(): string {
    return this.name;
  }

  getPath(): string {
    return this.path;
  }

  getConnection(): Database.Database {
    return this.db;
  }

  getStats(): DatabaseStats {
    return ontologyOps.getStats(this.db, this.name, this.path);
  }

  close(): void {
    this.db.close();
  }

  // ─── Files and chunks ──────────────────────────────────────────────────────

  insertFile(file: fileOps.NewFile): SourceFile | null {
    return fileOps.insertFile(this.db, file);
  }

  getFile(id: string): SourceFile | null {
    return fileOps.getFile(this.db, id);
  }

  getFileByHash(contentHash: string): SourceFile | null {
    return fileOps.getFileByHash(this.db, contentHash);
  }

  listFiles(): SourceFile[] {
    return fileOps.listFiles(this.db);
  }

  updateFileStatus(id: string, status: FileStatus): boolean {
    return fileOps.updateFileStatus(this.db, id, status);
  }

  resetFailedFile(id: string, fileName: string): SourceFile | null {
    return fileOps.resetFailedFile(this.db, id, fileName);
  }

  deleteFile(id: string): fileOps.DeleteFileResult | null {
    return fileOps.deleteFile(this.db, id);
  }

  insertChunks(fileId: string, texts: readonly string[]): SourceChunk[] {
    return fileOps.insertChunks(this.db, fileId, texts);
  }

  getChunks(fileId: string): SourceChunk[] {
    return fileOps.getChunks(this.db, fileId);
  }

  // ─── Proposals ─────────────────────────────────────────────────────────────

  insertProposal(proposal: Proposal, createdBy?: string): StoredProposal {
    return proposalOps.insertProposal(this.db, proposal, createdBy);
  }

  insertProposals(proposals: readonly Proposal[], createdBy?: string): StoredProposal[] {
    return proposalOps.insertProposals(this.db, proposals, createdBy);
  }

  getProposal(id: string): StoredProposal | null {
    return proposalOps.getProposal(this.db, id);
  }

  listProposals(status?: ProposalStatus): StoredProposal[] {
    return proposalOps.listProposals(this.db, status);
  }

  reviewProposal(id: string, action: proposalOps.ReviewAction, reviewedBy: string): proposalOps.ReviewOutcome {
    return proposalOps.reviewProposal(this.db, id, action, reviewedBy);
  }

  // ─── Ontology ──────────────────────────────────────────────────────────────

  findEntityIdByName(name: string): string | null {
    return ontologyOps.findEntityIdByName(this.db, name);
  }

  getOntology(): OntologyGraph {
    return ontologyOps.getOntology(this.db);
  }
}
