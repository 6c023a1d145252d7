import { describe, it, expect } from 'vitest';
import { normalizeLabel, projectSlug } from '../src/artifacts/slug.js';

describe('normalizeLabel', () => {
  it('should lowercase and collapse punctuation into underscores', () => {
    expect(normalizeLabel('My Cool Component!!')).toBe('my_cool_component');
  });

  it('should return an empty string for punctuation-only labels', () => {
    expect(normalizeLabel('---')).toBe('');
    expect(normalizeLabel('  !!  ')).toBe('');
  });

  it('should fold accented characters to ASCII', () => {
    expect(normalizeLabel('  Café Backend ')).toBe('cafe_backend');
    expect(normalizeLabel('Ünïcödé Façade — v2')).toBe('unicode_facade_v2');
  });

  it('should strip leading and trailing underscores', () => {
    expect(normalizeLabel('__init__')).toBe('init');
  });

  it('should keep digits', () => {
    expect(normalizeLabel('Service 42 / API')).toBe('service_42_api');
  });
});

describe('projectSlug', () => {
  it('should use hyphens between words', () => {
    expect(projectSlug('A Todo app for cats!')).toBe('a-todo-app-for-cats');
  });

  it('should truncate to 40 characters', () => {
    const slug = projectSlug('Build a collaborative whiteboard with realtime cursors');
    expect(slug).toBe('build-a-collaborative-whiteboard-with-re');
    expect(slug.length).toBe(40);
  });

  it('should not end with a separator after truncation', () => {
    expect(projectSlug('abcd efgh', 5)).toBe('abcd');
  });
});
