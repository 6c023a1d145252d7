import { describe, it, expect } from 'vitest';
import { ideaBrief, ideaProjectName, parseIdeaList, type IdeaListEntry } from '../src/pipeline/idea-list.js';

const planner: IdeaListEntry = {
  id: 3,
  category: 'Health',
  title: 'Meal Planner!',
  description: 'Plans meals around what is in the fridge.',
};

describe('Idea list', () => {
  it('should parse a valid list', () => {
    expect(parseIdeaList(JSON.stringify({ ideas: [planner] }))).toEqual([planner]);
  });

  it('should reject text that is not JSON', () => {
    expect(() => parseIdeaList('ideas: none', 'ideas.json')).toThrow('ideas.json is not valid JSON');
  });

  it('should name the field that is missing', () => {
    const raw = JSON.stringify({ ideas: [{ id: 1, category: 'Health', title: 'Tracker' }] });

    expect(() => parseIdeaList(raw)).toThrow(/ideas\.0\.description/);
  });

  it('should reject an empty list', () => {
    let caught: unknown;
    try {
      parseIdeaList('{"ideas": []}');
    } catch (error) {
      caught = error;
    }

    expect(caught).toMatchObject({ code: 'INVALID_IDEA_LIST' });
  });

  it('should derive the project name from the id and title', () => {
    expect(ideaProjectName(planner)).toBe('3-meal-planner');
  });

  it('should hand the title, category and description to the idea stage', () => {
    expect(ideaBrief(planner)).toBe('Meal Planner! (Health)\n\nPlans meals around what is in the fridge.');
  });
});
