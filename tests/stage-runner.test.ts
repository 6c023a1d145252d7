/**
 * Tests for the Stage Runner
 *
 * The generator is a vi.fn() returning canned replies, so every stage runs
 * end to end without a model.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import matter from 'gray-matter';
import { StageRunner, type StageProgress } from '../src/pipeline/stage-runner.js';
import { PIPELINE_STAGES, STAGE_IDS, getStage } from '../src/pipeline/stages.js';
import { silentLogger } from '../src/logger.js';

function writeProjectFile(root: string, relativePath: string, content: string): void {
  const target = path.join(root, relativePath);
  fs.mkdirSync(path.dirname(target), { recursive: true });
  fs.writeFileSync(target, content);
}

describe('Stage Runner', () => {
  let tmpDir: string;
  let projectRoot: string;
  let generate: ReturnType<typeof vi.fn>;
  let runner: StageRunner;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'ideasmith-stage-'));
    projectRoot = path.join(tmpDir, 'demo');
    fs.mkdirSync(path.join(projectRoot, 'docs'), { recursive: true });
    generate = vi.fn();
    runner = new StageRunner({ generator: { generate }, logger: silentLogger });
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  describe('stage table', () => {
    it('should define every stage under its own id', () => {
      for (const id of STAGE_IDS) {
        expect(PIPELINE_STAGES[id].id).toBe(id);
      }
    });

    it('should reject unknown stages', async () => {
      expect(() => getStage('deploy')).toThrow("Unknown stage 'deploy'");
      await expect(runner.run('deploy', { projectRoot })).rejects.toMatchObject({ code: 'UNKNOWN_STAGE' });
    });
  });

  describe('extract-features', () => {
    beforeEach(() => {
      writeProjectFile(projectRoot, 'docs/idea.md', '---\ntitle: demo\n---\n# Idea\nA shared shopping list\n');
    });

    it('should write one document per key feature', async () => {
      generate.mockResolvedValueOnce('<<<KEY_FEATURE: Shared Lists>>>\nShare.\n<<<KEY_FEATURE: Offline Mode>>>\nCache.');

      const result = await runner.run('extract-features', { projectRoot });

      expect(result).toEqual({
        stage: 'extract-features',
        outcome: 'success',
        report: { written: ['docs/feature_shared_lists.md', 'docs/feature_offline_mode.md'], failed: [] },
        dropped: [],
        attempts: 1,
      });
      expect(fs.readFileSync(path.join(projectRoot, 'docs/feature_offline_mode.md'), 'utf-8')).toBe('Cache.');
    });

    it('should put the inputs in the prompt without their frontmatter', async () => {
      generate.mockResolvedValueOnce('<<<KEY_FEATURE: Search>>>\nFind.');

      await runner.run('extract-features', { projectRoot });

      const prompt: string = generate.mock.calls[0][0];
      expect(prompt).toContain('# --- Content from: docs/idea.md ---\n\n# Idea\nA shared shopping list\n\n# --- End of: docs/idea.md ---');
      expect(prompt).not.toContain('title: demo');
      expect(prompt).toContain('<<<KEY_FEATURE: feature name>>>');
    });

    it('should ask again when a reply decodes to nothing', async () => {
      generate.mockResolvedValueOnce('Sorry, here are some thoughts instead.').mockResolvedValueOnce('<<<KEY_FEATURE: Search>>>\nFind.');

      const result = await runner.run('extract-features', { projectRoot });

      expect(generate).toHaveBeenCalledTimes(2);
      expect(result.attempts).toBe(2);
      expect(result.report.written).toEqual(['docs/feature_search.md']);
    });

    it('should give up with DECODE_EMPTY once the attempts are used', async () => {
      generate.mockResolvedValue('nothing useful');

      await expect(runner.run('extract-features', { projectRoot })).rejects.toMatchObject({
        code: 'DECODE_EMPTY',
        isRecoverable: false,
      });
      expect(generate).toHaveBeenCalledTimes(2);
      expect(fs.readdirSync(path.join(projectRoot, 'docs'))).toEqual(['idea.md']);
    });

    it('should honour maxAttempts', async () => {
      const patient = new StageRunner({ generator: { generate }, logger: silentLogger, maxAttempts: 3 });
      generate.mockResolvedValue('');

      await expect(patient.run('extract-features', { projectRoot })).rejects.toMatchObject({ code: 'DECODE_EMPTY' });
      expect(generate).toHaveBeenCalledTimes(3);
    });

    it('should report dropped blocks', async () => {
      generate.mockResolvedValueOnce('<<<KEY_FEATURE: --->>>\nx\n<<<KEY_FEATURE: Search>>>\ny');

      const result = await runner.run('extract-features', { projectRoot });

      expect(result.dropped).toEqual([
        { rawLabel: '---', role: 'key-feature', reason: 'label is empty after normalization' },
      ]);
      expect(result.report.written).toEqual(['docs/feature_search.md']);
    });

    it('should wrap generator failures as TRANSPORT_ERROR', async () => {
      generate.mockRejectedValueOnce(new Error('socket hang up'));

      await expect(runner.run('extract-features', { projectRoot })).rejects.toMatchObject({
        code: 'TRANSPORT_ERROR',
        message: 'extract-features: generation failed: socket hang up',
      });
    });

    it('should report progress', async () => {
      const messages: string[] = [];
      const tracked = new StageRunner({
        generator: { generate },
        logger: silentLogger,
        onProgress: (progress: StageProgress) => messages.push(progress.message),
      });
      generate.mockResolvedValueOnce('<<<KEY_FEATURE: Search>>>\nFind.');

      await tracked.run('extract-features', { projectRoot });

      expect(messages).toEqual([
        'Reading project documents...',
        'Extracting key features (attempt 1/2)...',
        'Writing 1 artifact(s)...',
      ]);
    });
  });

  it('should fail with MISSING_INPUT before calling the generator', async () => {
    await expect(runner.run('extract-features', { projectRoot })).rejects.toMatchObject({ code: 'MISSING_INPUT' });
    expect(generate).not.toHaveBeenCalled();
  });

  describe('expand-idea', () => {
    it('should require the idea text', async () => {
      await expect(runner.run('expand-idea', { projectRoot, idea: '   ' })).rejects.toMatchObject({
        code: 'MISSING_INPUT',
      });
    });

    it('should write docs/idea.md with frontmatter', async () => {
      generate.mockResolvedValueOnce('```markdown\n# Concept\nA list app\n```');

      const result = await runner.run('expand-idea', { projectRoot, idea: 'A shared shopping list' });

      expect(result.report.written).toEqual(['docs/idea.md']);
      expect(generate.mock.calls[0][0]).toContain('A shared shopping list');

      const saved = matter(fs.readFileSync(path.join(projectRoot, 'docs/idea.md'), 'utf-8'));
      expect(saved.data.title).toBe('demo');
      expect(saved.data.stage).toBe('expand-idea');
      expect(saved.content.trim()).toBe('# Concept\nA list app');
    });

    it('should unwrap a fenced reply with CRLF line endings', async () => {
      generate.mockResolvedValueOnce('```markdown\r\n# Concept\r\nA list app\r\n```\r\n');

      await runner.run('expand-idea', { projectRoot, idea: 'A shared shopping list' });

      const raw = fs.readFileSync(path.join(projectRoot, 'docs/idea.md'), 'utf-8');
      expect(raw).not.toContain('\r');
      expect(matter(raw).content.trim()).toBe('# Concept\nA list app');
    });
  });

  describe('update-idea', () => {
    beforeEach(() => {
      writeProjectFile(projectRoot, 'docs/idea.md', '# Idea\nOnline only');
    });

    it('should require a description of the changes', async () => {
      await expect(runner.run('update-idea', { projectRoot, instructions: ' ' })).rejects.toMatchObject({
        code: 'MISSING_INPUT',
      });
      expect(generate).not.toHaveBeenCalled();
    });

    it('should rewrite docs/idea.md from the current concept and the changes', async () => {
      generate.mockResolvedValueOnce('# Idea\nWorks offline too');

      const result = await runner.run('update-idea', { projectRoot, instructions: 'Add an offline mode' });

      const prompt: string = generate.mock.calls[0][0];
      expect(prompt).toContain('## Requested Changes\n\nAdd an offline mode\n');
      expect(prompt).toContain('# --- Content from: docs/idea.md ---\n\n# Idea\nOnline only');
      expect(result.report.written).toEqual(['docs/idea.md']);

      const saved = matter(fs.readFileSync(path.join(projectRoot, 'docs/idea.md'), 'utf-8'));
      expect(saved.data.stage).toBe('update-idea');
      expect(saved.content.trim()).toBe('# Idea\nWorks offline too');
    });
  });

  describe('idea analysis', () => {
    beforeEach(() => {
      writeProjectFile(projectRoot, 'docs/idea.md', '# Idea\nNotes');
    });

    it.each([
      ['analyze-business', 'docs/business.md'],
      ['analyze-market', 'docs/market_analysis.md'],
      ['research', 'docs/research_summary.md'],
    ])('%s should write %s from the idea', async (stage, document) => {
      generate.mockResolvedValueOnce('# Report\n\nFindings');

      const result = await runner.run(stage, { projectRoot });

      expect(result.report).toEqual({ written: [document], failed: [] });
      expect(generate.mock.calls[0][0]).toContain('# --- Content from: docs/idea.md ---');
      expect(matter(fs.readFileSync(path.join(projectRoot, document), 'utf-8')).content.trim()).toBe('# Report\n\nFindings');
    });

    it('should score with the business analysis when there is one', async () => {
      writeProjectFile(projectRoot, 'docs/business.md', 'Strong niche');
      generate.mockResolvedValueOnce('| Total | 7.5 |');

      const result = await runner.run('score', { projectRoot });

      expect(result.report.written).toEqual(['docs/scoring.md']);
      expect(generate.mock.calls[0][0]).toContain('# --- Content from: docs/business.md ---\n\nStrong niche');
    });
  });

  describe('generate-ideas', () => {
    it('should write a JSON list without frontmatter', async () => {
      generate.mockResolvedValueOnce('```json\n{"ideas": []}\n```');

      const result = await runner.run('generate-ideas', {
        projectRoot: tmpDir,
        idea: 'meal planning',
        ideaCount: 3,
        listName: 'Meal Ideas',
      });

      expect(generate.mock.calls[0][0]).toContain('Generate 3 distinct product ideas in the field of: meal planning');
      expect(result.report.written).toEqual(['meal-ideas.json']);
      expect(fs.readFileSync(path.join(tmpDir, 'meal-ideas.json'), 'utf-8')).toBe('{"ideas": []}\n');
    });

    it('should reject an idea count out of range', async () => {
      await expect(
        runner.run('generate-ideas', { projectRoot: tmpDir, idea: 'meal planning', ideaCount: 0 })
      ).rejects.toMatchObject({ code: 'MISSING_INPUT' });
      expect(generate).not.toHaveBeenCalled();
    });
  });

  describe('generate-docs', () => {
    beforeEach(() => {
      writeProjectFile(projectRoot, 'docs/idea.md', '# Idea\nNotes');
    });

    it('should reject an unknown document type', async () => {
      await expect(runner.run('generate-docs', { projectRoot, docType: 'brochure' })).rejects.toMatchObject({
        code: 'MISSING_INPUT',
      });
      expect(generate).not.toHaveBeenCalled();
    });

    it('should write the document named by its type', async () => {
      generate.mockResolvedValueOnce('# Requirements\n\n1. Lists can be shared');

      const result = await runner.run('generate-docs', { projectRoot, docType: 'srs' });

      expect(result.report.written).toEqual(['docs/srs.md']);
      expect(generate.mock.calls[0][0]).toContain('software requirements specification');
    });
  });

  describe('generate-code', () => {
    it('should feed integration plans before component plans', async () => {
      writeProjectFile(projectRoot, 'docs/impl_api.md', 'API plan');
      writeProjectFile(projectRoot, 'docs/integ.md', 'Integration plan');
      generate.mockResolvedValueOnce('```python filename=src/api/app.py\nprint(1)\n```');

      const result = await runner.run('generate-code', { projectRoot });

      const prompt: string = generate.mock.calls[0][0];
      expect(prompt.indexOf('Content from: docs/integ.md')).toBeGreaterThan(-1);
      expect(prompt.indexOf('Content from: docs/integ.md')).toBeLessThan(prompt.indexOf('Content from: docs/impl_api.md'));
      expect(result.report.written).toEqual(['src/api/app.py']);
      expect(fs.readFileSync(path.join(projectRoot, 'src/api/app.py'), 'utf-8')).toBe('print(1)');
    });
  });

  describe('review-code and fix-code', () => {
    beforeEach(() => {
      writeProjectFile(projectRoot, 'docs/impl_api.md', 'API plan');
      writeProjectFile(projectRoot, 'src/app.py', 'print(1)');
    });

    it('should write the review to docs/review.md', async () => {
      generate.mockResolvedValueOnce('# Review\n\n- src/app.py prints the wrong value');

      const result = await runner.run('review-code', { projectRoot });

      expect(result.report.written).toEqual(['docs/review.md']);
      expect(generate.mock.calls[0][0]).toContain('# --- Content from: src/app.py ---\n\nprint(1)');
    });

    it('should need a review before fixing', async () => {
      await expect(runner.run('fix-code', { projectRoot })).rejects.toMatchObject({ code: 'MISSING_INPUT' });
      expect(generate).not.toHaveBeenCalled();
    });

    it('should rewrite the files the review names', async () => {
      writeProjectFile(projectRoot, 'docs/review.md', 'Print 2 instead');
      generate.mockResolvedValueOnce('```python filename=src/app.py\nprint(2)\n```');

      const result = await runner.run('fix-code', { projectRoot });

      const prompt: string = generate.mock.calls[0][0];
      expect(prompt.indexOf('Content from: docs/review.md')).toBeGreaterThan(-1);
      expect(prompt.indexOf('Content from: docs/review.md')).toBeLessThan(prompt.indexOf('Content from: docs/impl_api.md'));
      expect(result.report.written).toEqual(['src/app.py']);
      expect(fs.readFileSync(path.join(projectRoot, 'src/app.py'), 'utf-8')).toBe('print(2)');
    });
  });

  describe('plan-tasks', () => {
    beforeEach(() => {
      writeProjectFile(projectRoot, 'docs/impl_api.md', 'API plan');
    });

    it('should finish as partial when some artifacts fail', async () => {
      generate.mockResolvedValueOnce(
        '<<<FILENAME: tasks/task_01_setup.md>>>\nSet up\n>>>\n<<<FILENAME: ../escape.md>>>\nx\n>>>'
      );

      const result = await runner.run('plan-tasks', { projectRoot });

      expect(result.outcome).toBe('partial');
      expect(result.report.written).toEqual(['tasks/task_01_setup.md']);
      expect(result.report.failed).toEqual([{ path: '../escape.md', reason: 'path traversal', kind: 'unsafe-path' }]);
    });

    it('should throw STAGE_FAILED when nothing could be written', async () => {
      generate.mockResolvedValueOnce('<<<FILENAME: ../escape.md>>>\nx\n>>>');

      await expect(runner.run('plan-tasks', { projectRoot })).rejects.toMatchObject({
        code: 'STAGE_FAILED',
        message: 'plan-tasks: nothing was written: ../escape.md (path traversal)',
      });
      expect(fs.existsSync(path.join(tmpDir, 'escape.md'))).toBe(false);
    });
  });
});
