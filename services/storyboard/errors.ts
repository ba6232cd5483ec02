/**
 * Storyboard Error Types
 *
 * Every fatal condition of a generation run is a StoryboardError subclass with
 * a stable `code`. Errors raised after some scenes were accepted carry them in
 * `partialScenes` so callers can keep what was already parsed.
 */

import type { SceneRecord } from '@/types';

export type StoryboardErrorCode =
  | 'COLLABORATOR_FAILURE'
  | 'EMPTY_RESPONSE'
  | 'PARSE_FAILURE'
  | 'STALLED_PROGRESS'
  | 'ITERATION_LIMIT'
  | 'INCOMPLETE_STORYBOARD'
  | 'VALIDATION_ERROR'
  | 'CONFIGURATION_ERROR';

export class StoryboardError extends Error {
  constructor(
    message: string,
    public readonly code: StoryboardErrorCode,
    public readonly partialScenes: readonly SceneRecord[] = [],
  ) {
    super(message);
    this.name = 'StoryboardError';
  }
}

export class CollaboratorFailureError extends StoryboardError {
  constructor(message: string, public readonly collaborator: string, partialScenes: readonly SceneRecord[] = []) {
    super(`${collaborator} call failed: ${message}`, 'COLLABORATOR_FAILURE', partialScenes);
    this.name = 'CollaboratorFailureError';
  }
}

export class EmptyResponseError extends StoryboardError {
  constructor(public readonly collaborator: string, partialScenes: readonly SceneRecord[] = []) {
    super(`${collaborator} returned an empty response`, 'EMPTY_RESPONSE', partialScenes);
    this.name = 'EmptyResponseError';
  }
}

export class ParseFailureError extends StoryboardError {
  constructor(public readonly preview: string, partialScenes: readonly SceneRecord[] = []) {
    super(`No scene markers found in response. Preview: ${preview}`, 'PARSE_FAILURE', partialScenes);
    this.name = 'ParseFailureError';
  }
}

export class StalledProgressError extends StoryboardError {
  constructor(
    public readonly lastScene: number,
    public readonly batchRange: readonly [number, number],
    partialScenes: readonly SceneRecord[] = [],
  ) {
    super(
      `Continuation for scenes ${batchRange[0]}-${batchRange[1]} made no progress (stuck at scene ${lastScene})`,
      'STALLED_PROGRESS',
      partialScenes,
    );
    this.name = 'StalledProgressError';
  }
}

export class IterationLimitError extends StoryboardError {
  constructor(
    public readonly lastScene: number,
    public readonly maxIterations: number,
    partialScenes: readonly SceneRecord[] = [],
  ) {
    super(
      `Storyboard still incomplete after ${maxIterations} continuation requests (last scene ${lastScene})`,
      'ITERATION_LIMIT',
      partialScenes,
    );
    this.name = 'IterationLimitError';
  }
}

export class IncompleteStoryboardError extends StoryboardError {
  constructor(public readonly missingScenes: readonly number[], partialScenes: readonly SceneRecord[] = []) {
    super(`Storyboard is missing scenes: ${missingScenes.join(', ')}`, 'INCOMPLETE_STORYBOARD', partialScenes);
    this.name = 'IncompleteStoryboardError';
  }
}

export class ValidationError extends StoryboardError {
  constructor(message: string) {
    super(message, 'VALIDATION_ERROR');
    this.name = 'ValidationError';
  }
}

export class ConfigurationError extends StoryboardError {
  constructor(message: string) {
    super(message, 'CONFIGURATION_ERROR');
    this.name = 'ConfigurationError';
  }
}
