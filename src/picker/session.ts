/**
 * Picker Session
 *
 * Owns the candidate set loaded at startup, the current query, the ranked
 * view and the selection. Every query edit replaces the ranked view
 * wholesale; the candidate set never changes.
 *
 * Two ways to re-rank:
 * - setQuery: one blocking pass
 * - setQueryAsync: the same pass split into chunks with event-loop yields in
 *   between. Each edit takes a new generation number and a pass that is no
 *   longer the latest generation stops without touching state, so the view
 *   always holds the result of the most recent query.
 */

import { setImmediate as yieldToEventLoop } from 'timers/promises';
import { env } from '../config';
import { compareRanked, rankWithScores, scoreCandidates } from '../matching';
import type { MatchOptions, RankedCandidate } from '../matching';
import { logger, PickerError } from '../utils';
import { clampSelection, moveSelection } from './selection';

export interface SessionOptions extends MatchOptions {
  /** Candidates scored between yields in setQueryAsync */
  chunkSize?: number;
}

export interface PickerState {
  query: string;
  items: readonly string[];
  selectedIndex: number | null;
  generation: number;
}

export class PickerSession {
  private readonly candidates: readonly string[];
  private readonly matchOptions: MatchOptions;
  private readonly chunkSize: number;

  private currentQuery = '';
  private ranked: readonly RankedCandidate[];
  private selection: number | null;
  private generation = 0;

  constructor(candidates: readonly string[], options: SessionOptions = {}) {
    const chunkSize = options.chunkSize ?? env.PICKER_CHUNK_SIZE;
    if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
      throw PickerError.invalidOption(`chunkSize must be a positive integer, got ${chunkSize}`);
    }

    this.candidates = Object.freeze([...candidates]);
    this.matchOptions = { consecutiveRule: options.consecutiveRule ?? env.PICKER_CONSECUTIVE_RULE };
    this.chunkSize = chunkSize;

    // Initial view: every candidate, unranked
    this.ranked = rankWithScores('', this.candidates);
    this.selection = clampSelection(null, this.ranked.length);
  }

  get query(): string {
    return this.currentQuery;
  }

  get items(): readonly string[] {
    return this.ranked.map((entry) => entry.candidate);
  }

  get results(): readonly RankedCandidate[] {
    return this.ranked;
  }

  get selectedIndex(): number | null {
    return this.selection;
  }

  get selected(): string | undefined {
    return this.selection === null ? undefined : this.ranked[this.selection]?.candidate;
  }

  get state(): PickerState {
    return {
      query: this.currentQuery,
      items: this.items,
      selectedIndex: this.selection,
      generation: this.generation,
    };
  }

  /**
   * Re-ranks synchronously. Supersedes any pass still running in setQueryAsync.
   */
  setQuery(query: string): readonly string[] {
    this.generation += 1;
    this.apply(query, rankWithScores(query, this.candidates, this.matchOptions));
    return this.items;
  }

  /**
   * Re-ranks in chunks. Resolves `true` when this pass produced the view and
   * `false` when a newer edit superseded it.
   */
  async setQueryAsync(query: string): Promise<boolean> {
    this.generation += 1;
    const generation = this.generation;

    if (query.length === 0) {
      this.apply(query, rankWithScores(query, this.candidates, this.matchOptions));
      return true;
    }

    const kept: RankedCandidate[] = [];
    for (let start = 0; start < this.candidates.length; start += this.chunkSize) {
      if (start > 0) {
        await yieldToEventLoop();
        if (generation !== this.generation) {
          logger.debug(`Dropped rank pass for "${query}" (generation ${generation})`);
          return false;
        }
      }

      const chunk = this.candidates.slice(start, start + this.chunkSize);
      for (const entry of scoreCandidates(query, chunk, this.matchOptions, start)) {
        kept.push(entry);
      }
    }

    this.apply(query, kept.sort(compareRanked));
    return true;
  }

  moveSelection(offset: number): number | null {
    this.selection = moveSelection(this.selection, offset, this.ranked.length);
    return this.selection;
  }

  /**
   * Selects a row of the current view. Out-of-range indices are ignored.
   */
  selectRow(index: number): void {
    if (Number.isInteger(index) && index >= 0 && index < this.ranked.length) {
      this.selection = index;
    }
  }

  private apply(query: string, results: readonly RankedCandidate[]): void {
    this.currentQuery = query;
    this.ranked = results;
    this.selection = clampSelection(this.selection, results.length);

    logger.debug(
      `Ranked ${results.length} of ${this.candidates.length} candidates for "${query}"`
    );
  }
}

export default PickerSession;
