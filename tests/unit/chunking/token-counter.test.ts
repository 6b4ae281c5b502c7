/**
 * Unit tests for token counters
 *
 * @module tests/unit/chunking/token-counter
 */

import { describe, it, expect } from 'vitest';
import {
  createTokenCounter,
  GptTokenCounter,
  WhitespaceTokenCounter,
} from '../../../src/services/chunking/token-counter.js';

describe('WhitespaceTokenCounter', () => {
  const counter = new WhitespaceTokenCounter();

  it('counts whitespace-separated words', () => {
    expect(counter.count('  a  b\nc ')).toBe(3);
    expect(counter.count('')).toBe(0);
  });

  it('truncates to the first N words', () => {
    expect(counter.truncate('one two  three four', 2)).toBe('one two');
    expect(counter.truncate('one two', 5)).toBe('one two');
    expect(counter.truncate('one two', 0)).toBe('');
  });
});

describe('GptTokenCounter', () => {
  const counter = new GptTokenCounter();

  it('counts BPE tokens', () => {
    expect(counter.count('')).toBe(0);
    expect(counter.count('hello world')).toBe(2);
  });

  it('truncates by tokens', () => {
    expect(counter.truncate('hello world', 1)).toBe('hello');
    expect(counter.truncate('hello world', 10)).toBe('hello world');
  });
});

describe('createTokenCounter', () => {
  it('builds the requested counter', () => {
    expect(createTokenCounter('gpt').name).toBe('gpt-tokenizer');
    expect(createTokenCounter('whitespace').name).toBe('whitespace');
  });
});
