/**
 * Audit Log Service
 *
 * Writes every storyboard request and raw response to disk for offline
 * debugging. Each exchange produces two JSON files sharing the generation
 * timestamp of the run:
 *
 *   storyboard_<generation>_<seq>_prompt.json
 *   storyboard_<generation>_<seq>_response.json
 *
 * Records are write-only; nothing in the engine reads them back. A failed
 * write is logged and does not abort the run.
 */

import { mkdir, writeFile } from 'fs/promises';
import path from 'path';
import type { GenerationMode, SongIdentifiers } from '@/types';
import { auditLogger } from './logger';

const MAX_TEXT_LENGTH = 200_000;

export interface AuditMetadata {
  mode: GenerationMode;
  batchRange: [number, number];
}

interface AuditRecordBase {
  timestamp: string;
  songIdentifiers: SongIdentifiers;
  secondsPerScene: number;
  metadata: AuditMetadata;
}

export type AuditPromptRecord = AuditRecordBase & { prompt: string };
export type AuditResponseRecord = AuditRecordBase & { rawResponse: string };

export interface AuditRecorder {
  recordExchange(metadata: AuditMetadata, prompt: string, rawResponse: string): Promise<void>;
}

function truncate(text: string): string {
  if (text.length <= MAX_TEXT_LENGTH) return text;
  return text.slice(0, MAX_TEXT_LENGTH) + `... [truncated, ${text.length} total chars]`;
}

/**
 * Filesystem-safe generation stamp, e.g. 2026-10-19T08-30-00-000Z.
 */
export function formatGenerationStamp(date: Date): string {
  return date.toISOString().replace(/[:.]/g, '-');
}

export interface FileAuditRecorderOptions {
  directory: string;
  songIdentifiers: SongIdentifiers;
  secondsPerScene: number;
  /** Start of the generation run; names every file of the run */
  generationStartedAt?: Date;
  now?: () => Date;
}

export class FileAuditRecorder implements AuditRecorder {
  private readonly stamp: string;
  private readonly now: () => Date;
  private sequence = 0;

  constructor(private readonly options: FileAuditRecorderOptions) {
    this.now = options.now ?? (() => new Date());
    this.stamp = formatGenerationStamp(options.generationStartedAt ?? this.now());
  }

  async recordExchange(metadata: AuditMetadata, prompt: string, rawResponse: string): Promise<void> {
    this.sequence++;
    const seq = String(this.sequence).padStart(2, '0');
    const base: AuditRecordBase = {
      timestamp: this.now().toISOString(),
      songIdentifiers: this.options.songIdentifiers,
      secondsPerScene: this.options.secondsPerScene,
      metadata,
    };

    const promptRecord: AuditPromptRecord = { ...base, prompt: truncate(prompt) };
    const responseRecord: AuditResponseRecord = { ...base, rawResponse: truncate(rawResponse) };
    const prefix = path.join(this.options.directory, `storyboard_${this.stamp}_${seq}`);

    try {
      await mkdir(this.options.directory, { recursive: true });
      await writeFile(`${prefix}_prompt.json`, JSON.stringify(promptRecord, null, 2), 'utf-8');
      await writeFile(`${prefix}_response.json`, JSON.stringify(responseRecord, null, 2), 'utf-8');
      auditLogger.debug(`Wrote audit records ${prefix}_*.json`);
    } catch (error) {
      auditLogger.warn(`Failed to write audit records for ${prefix}`, error instanceof Error ? error.message : error);
    }
  }
}

/** Recorder used when auditing is disabled */
export const noopAuditRecorder: AuditRecorder = {
  async recordExchange() {
    // auditing disabled
  },
};
