import { describe, expect, it } from 'vitest';
import { JOB_STATUSES, type JobStatus } from '../../../src/types';
import { InvalidTransitionError } from '../../../src/types/errors';
import { canTransition, isTerminal, transitionJob } from '../../../src/utils/jobStateMachine';

describe('job state machine', () => {
  it('accepts every forward move', () => {
    const forward: Array<[JobStatus, JobStatus]> = [
      ['PENDING', 'SCHEDULED'],
      ['PENDING', 'RUNNING'],
      ['PENDING', 'SUCCEEDED'],
      ['SCHEDULED', 'RUNNING'],
      ['SCHEDULED', 'SUCCEEDED'],
      ['RUNNING', 'SUCCEEDED'],
    ];
    for (const [from, to] of forward) expect(canTransition(from, to)).toBe(true);
  });

  it('reaches FAILED and CANCELLED from any live state', () => {
    for (const from of ['PENDING', 'SCHEDULED', 'RUNNING'] as const) {
      expect(canTransition(from, 'FAILED')).toBe(true);
      expect(canTransition(from, 'CANCELLED')).toBe(true);
    }
  });

  it('rejects regressions', () => {
    expect(canTransition('RUNNING', 'SCHEDULED')).toBe(false);
    expect(canTransition('RUNNING', 'PENDING')).toBe(false);
    expect(canTransition('SCHEDULED', 'PENDING')).toBe(false);
  });

  it('never leaves a terminal state', () => {
    for (const from of ['SUCCEEDED', 'FAILED', 'CANCELLED'] as const) {
      for (const to of JOB_STATUSES) expect(canTransition(from, to)).toBe(false);
    }
  });

  it('marks exactly the three end states as terminal', () => {
    expect(JOB_STATUSES.filter(isTerminal)).toEqual(['SUCCEEDED', 'FAILED', 'CANCELLED']);
  });

  it('treats writing the same status as a no-op', () => {
    expect(transitionJob('RUNNING', 'RUNNING')).toBe('RUNNING');
    expect(transitionJob('SUCCEEDED', 'SUCCEEDED')).toBe('SUCCEEDED');
  });

  it('throws InvalidTransitionError for a refused move', () => {
    expect(() => transitionJob('SUCCEEDED', 'RUNNING')).toThrow(InvalidTransitionError);
    expect(() => transitionJob('RUNNING', 'PENDING')).toThrow('Job status cannot move from RUNNING to PENDING');
  });
});
