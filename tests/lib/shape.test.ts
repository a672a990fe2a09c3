/**
 * DevGate — Payload Shaping Tests
 */

import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { ShapeError } from '../../src/lib/errors';
import { numberOr, parseEach, parsePayload, stringOr, take } from '../../src/lib/shape';

const Schema = z.object({
  id: z.number(),
  title: stringOr('No Title'),
  score: numberOr(0),
  url: stringOr(null),
});

describe('parsePayload', () => {
  it('should fill defaults for absent and null fields', () => {
    expect(parsePayload(Schema, { id: 1, title: null }, 'Test')).toEqual({
      id: 1,
      title: 'No Title',
      score: 0,
      url: null,
    });
  });

  it('should keep present values', () => {
    expect(parsePayload(Schema, { id: 2, title: 'Hello', score: 5, url: 'https://a.test' }, 'Test')).toEqual({
      id: 2,
      title: 'Hello',
      score: 5,
      url: 'https://a.test',
    });
  });

  it('should throw a ShapeError naming the upstream when a required field is missing', () => {
    let caught: unknown;
    try {
      parsePayload(Schema, { title: 'x' }, 'Test');
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ShapeError);
    expect(caught).toMatchObject({
      status: 500,
      message: 'Unexpected response from the Test API.',
      issues: ['id: Required'],
    });
  });
});

describe('parseEach', () => {
  it('should fail the whole list when one item is malformed', () => {
    expect(() => parseEach(Schema, [{ id: 1 }, { id: 'two' }], 'Test')).toThrow(ShapeError);
  });
});

describe('take', () => {
  it('should keep the first entries only', () => {
    expect(take([1, 2, 3, 4], 2)).toEqual([1, 2]);
    expect(take([1], 5)).toEqual([1]);
  });
});
