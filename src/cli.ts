#!/usr/bin/env node

import { config as loadEnv } from 'dotenv';
import { resolve } from 'path';
import * as fs from 'fs';
import * as path from 'path';
import { Command } from 'commander';
import chalk from 'chalk';
import ora, { type Ora } from 'ora';
import { ConfigManager, type Config } from './config.js';
import { errorMessage } from './errors.js';
import { setVerbose } from './logger.js';
import { decodeResponse } from './artifacts/decoder.js';
import { GRAMMARS, getGrammar } from './artifacts/grammar.js';
import { materialize, resolveArtifactPath, type WriteReport } from './artifacts/materializer.js';
import { validateArtifactPath } from './artifacts/path-safety.js';
import { createContentGenerator, DEFAULT_ANTHROPIC_MODEL, DEFAULT_OLLAMA_MODEL, type ProviderContentGenerator } from './llm/index.js';
import { StageRunner, type RunStageOptions } from './pipeline/stage-runner.js';
import { ideaBrief, ideaProjectName, parseIdeaList, type IdeaListEntry } from './pipeline/idea-list.js';
import { getStage, type StageId } from './pipeline/stages.js';
import { DOC_TYPES } from './prompts/stage-prompts.js';
import {
  ensureProjectStructure,
  listProjects,
  projectExists,
  projectNameFromIdea,
  projectPath,
} from './project.js';

// Load .env from current working directory (supports global installation)
loadEnv({ path: resolve(process.cwd(), '.env') });

type GlobalOptions = {
  projectsDir?: string;
  verbose?: boolean;
};

interface Settings {
  configManager: ConfigManager;
  config: Config;
  projectsDir: string;
}

const program = new Command();

program
  .name('ideasmith')
  .description('Turn a one-line idea into a project: concept, features, architecture, code, tests and docs.')
  .version('0.1.0')
  .option('--projects-dir <path>', 'Directory holding the projects (default: ~/ideasmith-projects)')
  .option('-v, --verbose', 'Verbose output');

async function loadSettings(): Promise<Settings> {
  const globals = program.opts<GlobalOptions>();
  const configManager = new ConfigManager();
  const config = await configManager.load();

  setVerbose(Boolean(globals.verbose) || config.verbose);

  return {
    configManager,
    config,
    projectsDir: path.resolve(globals.projectsDir ?? configManager.getProjectsDir()),
  };
}

function printReport(report: WriteReport): void {
  for (const written of report.written) {
    console.log(chalk.green('  ✓'), written);
  }
  for (const failed of report.failed) {
    console.log(chalk.red('  ✗'), failed.path, chalk.gray(`(${failed.reason})`));
  }
}

function fail(spinner: Ora | undefined, error: unknown): void {
  if (spinner?.isSpinning) {
    spinner.fail('Stage failed');
  }
  console.error(chalk.red('\nError:'), errorMessage(error));
  process.exitCode = 1;
}

interface StageExtras extends Omit<RunStageOptions, 'projectRoot'> {
  /** Create the project (and its layout) when it does not exist yet */
  create?: boolean;
}

/**
 * Run one stage against a project, with a spinner tracking its phases.
 * Without a project name the stage runs in the projects directory itself
 * (idea lists live there). Resolves to false when the stage failed.
 */
async function runStage(stageId: StageId, projectName: string | undefined, extra: StageExtras = {}): Promise<boolean> {
  const stage = getStage(stageId);
  const spinner = ora();
  let generator: ProviderContentGenerator | undefined;

  try {
    const { config, projectsDir } = await loadSettings();
    const projectRoot = projectName === undefined ? projectsDir : projectPath(projectsDir, projectName);

    if (projectName !== undefined) {
      if (extra.create) {
        await ensureProjectStructure(projectRoot);
      } else if (!projectExists(projectRoot)) {
        throw new Error(`Project '${projectName}' not found in ${projectsDir}. Start one with: ideasmith idea "<text>"`);
      }
    }

    console.log(chalk.cyan.bold(`\n🛠  ${stage.title}`), chalk.gray(`(${projectName ?? projectsDir})\n`));

    generator = await createContentGenerator({
      provider: config.provider,
      apiKey: config.apiKey,
      model: config.model,
      ollamaHost: config.ollamaHost,
      maxTokens: config.maxTokens,
      temperature: config.temperature,
      timeoutMs: config.requestTimeoutMs,
    });

    const runner = new StageRunner({
      generator,
      maxAttempts: config.maxAttempts,
      extensionlessFiles: config.extensionlessFiles,
      onProgress: (progress) => {
        spinner.text = progress.message;
      },
    });

    spinner.start(`${stage.title}...`);
    const result = await runner.run(stageId, {
      projectRoot,
      idea: extra.idea,
      instructions: extra.instructions,
      docType: extra.docType,
      ideaCount: extra.ideaCount,
      listName: extra.listName,
    });

    if (result.outcome === 'partial') {
      spinner.warn(chalk.yellow(`${stage.title}: ${result.report.failed.length} artifact(s) could not be written`));
    } else {
      spinner.succeed(chalk.green(`${stage.title}: done`));
    }
    printReport(result.report);
    if (result.dropped.length > 0) {
      console.log(chalk.yellow(`  ${result.dropped.length} block(s) dropped while decoding (see warnings above)`));
    }
    console.log(chalk.gray(`\nProject: ${projectRoot}`));
    return true;
  } catch (error) {
    fail(spinner, error);
    return false;
  } finally {
    await generator?.close();
  }
}

program
  .command('list')
  .description('List projects')
  .action(async () => {
    try {
      const { projectsDir } = await loadSettings();
      const projects = await listProjects(projectsDir);

      if (projects.length === 0) {
        console.log(chalk.yellow(`No projects in ${projectsDir}`));
        return;
      }
      console.log(chalk.cyan(`\n📁 Projects in ${projectsDir}:\n`));
      for (const name of projects) {
        console.log(`  ${name}`);
      }
    } catch (error) {
      fail(undefined, error);
    }
  });

program
  .command('idea <text>')
  .description('Expand an idea into docs/idea.md, creating the project')
  .option('-p, --project <name>', 'Project name (default: derived from the idea)')
  .action(async (text: string, options: { project?: string }) => {
    await runStage('expand-idea', options.project ?? projectNameFromIdea(text), { idea: text, create: true });
  });

program
  .command('update-idea <changes>')
  .description('Revise docs/idea.md with the described changes')
  .requiredOption('-p, --project <name>', 'Project name')
  .action(async (changes: string, options: { project: string }) => {
    await runStage('update-idea', options.project, { instructions: changes });
  });

program
  .command('ideas <subject>')
  .description('Generate a JSON list of project ideas on a subject')
  .option('-n, --count <number>', 'Number of ideas', '10')
  .option('--name <name>', 'List file name, without extension', 'ideas')
  .action(async (subject: string, options: { count: string; name: string }) => {
    await runStage('generate-ideas', undefined, {
      idea: subject,
      ideaCount: Number(options.count),
      listName: options.name,
    });
  });

program
  .command('bulk <file>')
  .description('Create a project from every entry of an idea list: idea, business analysis and score')
  .action(async (file: string) => {
    let ideas: IdeaListEntry[];
    try {
      const source = path.resolve(file);
      ideas = parseIdeaList(fs.readFileSync(source, 'utf-8'), source);
    } catch (error) {
      fail(undefined, error);
      return;
    }

    let completed = 0;
    for (const entry of ideas) {
      const name = ideaProjectName(entry);
      console.log(chalk.cyan(`\n💡 ${entry.id}. ${entry.title}`), chalk.gray(`[${entry.category}] → ${name}`));

      const ok =
        (await runStage('expand-idea', name, { idea: ideaBrief(entry), create: true })) &&
        (await runStage('analyze-business', name)) &&
        (await runStage('score', name));
      if (ok) {
        completed++;
      }
    }
    console.log(chalk.gray(`\n${completed}/${ideas.length} idea(s) completed`));
  });

program
  .command('code')
  .description('Generate source code from the plans, or apply docs/review.md with --fix')
  .requiredOption('-p, --project <name>', 'Project name')
  .option('--fix', 'Rewrite the files named in docs/review.md')
  .action(async (options: { project: string; fix?: boolean }) => {
    await runStage(options.fix ? 'fix-code' : 'generate-code', options.project);
  });

const STAGE_COMMANDS: Array<{ name: string; stage: StageId; description: string }> = [
  { name: 'business', stage: 'analyze-business', description: 'Write a business analysis of the idea' },
  { name: 'analyze', stage: 'analyze-market', description: 'Write a market analysis of the idea' },
  { name: 'research', stage: 'research', description: 'Summarize relevant technologies and approaches' },
  { name: 'features', stage: 'extract-features', description: 'Extract key features from the idea' },
  { name: 'build', stage: 'plan-architecture', description: 'Plan components and integration per feature' },
  { name: 'review', stage: 'review-code', description: 'Review the source code against the plans' },
  { name: 'tests', stage: 'generate-tests', description: 'Generate tests for the source code' },
  { name: 'diagrams', stage: 'generate-diagrams', description: 'Generate Mermaid diagrams' },
  { name: 'tasks', stage: 'plan-tasks', description: 'Break the plans into development tasks' },
  { name: 'score', stage: 'score', description: 'Score the idea' },
];

for (const command of STAGE_COMMANDS) {
  program
    .command(command.name)
    .description(command.description)
    .requiredOption('-p, --project <name>', 'Project name')
    .action(async (options: { project: string }) => {
      await runStage(command.stage, options.project);
    });
}

program
  .command('docs <type>')
  .description(`Write project documentation (${DOC_TYPES.join(', ')})`)
  .requiredOption('-p, --project <name>', 'Project name')
  .action(async (type: string, options: { project: string }) => {
    await runStage('generate-docs', options.project, { docType: type });
  });

program
  .command('decode <file>')
  .description('Decode a saved model response and write its artifacts (no model call)')
  .requiredOption('-g, --grammar <grammar>', `Delimiter grammar (${Object.keys(GRAMMARS).join(', ')})`)
  .option('-p, --project <name>', 'Write into this project')
  .option('-o, --out <dir>', 'Write into this directory')
  .option('--dry-run', 'List decoded blocks and target paths without writing')
  .action(async (file: string, options: { grammar: string; project?: string; out?: string; dryRun?: boolean }) => {
    try {
      const { config, projectsDir } = await loadSettings();
      const grammar = getGrammar(options.grammar);
      const raw = fs.readFileSync(path.resolve(file), 'utf-8');
      const { blocks, dropped } = decodeResponse(raw, grammar.kind);

      console.log(chalk.cyan(`\n🔎 ${blocks.length} block(s) decoded with ${grammar.kind}`) + chalk.gray(` (${dropped.length} dropped)\n`));

      if (options.dryRun) {
        for (const block of blocks) {
          const target = resolveArtifactPath(block, grammar.kind);
          const check = validateArtifactPath(target, {
            labelStyle: grammar.labelStyle,
            extensionlessFiles: config.extensionlessFiles,
          });
          const lines = block.body.split('\n').length;
          if (check.ok) {
            console.log(chalk.green('  ✓'), check.path, chalk.gray(`[${block.role}, ${lines} lines]`));
          } else {
            console.log(chalk.red('  ✗'), target || block.label, chalk.gray(`(${check.reason})`));
          }
        }
        return;
      }

      let root: string;
      if (options.out) {
        root = path.resolve(options.out);
      } else if (options.project) {
        root = projectPath(projectsDir, options.project);
      } else {
        throw new Error('Choose where to write with --project <name> or --out <dir>, or use --dry-run');
      }

      const report = await materialize(blocks, grammar.kind, root, { extensionlessFiles: config.extensionlessFiles });
      printReport(report);
      if (report.written.length === 0) {
        process.exitCode = 1;
      }
    } catch (error) {
      fail(undefined, error);
    }
  });

program
  .command('config')
  .description('Show configuration or how to set it up')
  .option('--show', 'Show current configuration')
  .action(async (options: { show?: boolean }) => {
    try {
      const { configManager, config, projectsDir } = await loadSettings();

      if (options.show) {
        const defaultModel = config.provider === 'ollama' ? DEFAULT_OLLAMA_MODEL : DEFAULT_ANTHROPIC_MODEL;
        console.log(chalk.cyan('\n📋 Current Configuration:'));
        console.log(chalk.gray('Config file:'), configManager.getConfigFile());
        console.log(chalk.gray('Provider:'), config.provider);
        console.log(chalk.gray('Model:'), config.model ?? `${defaultModel} (default)`);
        if (config.provider === 'ollama') {
          console.log(chalk.gray('Ollama host:'), config.ollamaHost ?? 'http://localhost:11434 (default)');
        } else {
          console.log(chalk.gray('API Key:'), config.apiKey ? '***' + config.apiKey.slice(-4) : chalk.red('Not set'));
        }
        console.log(chalk.gray('Projects:'), projectsDir);
        console.log(chalk.gray('Attempts per stage:'), config.maxAttempts);
        console.log(chalk.gray('Max tokens:'), config.maxTokens);
        console.log(chalk.gray('Temperature:'), config.temperature ?? 'provider default');
        if (config.requestTimeoutMs !== undefined) {
          console.log(chalk.gray('Request timeout:'), `${config.requestTimeoutMs} ms`);
        }
        return;
      }

      console.log(chalk.yellow('\n🔐 API Key Configuration\n'));
      console.log(chalk.white('Create a .env file in the working directory:\n'));
      console.log(chalk.gray('  echo "ANTHROPIC_API_KEY=your-key-here" > .env\n'));
      console.log(chalk.white('Or use a local Ollama server:\n'));
      console.log(chalk.gray('  export IDEASMITH_PROVIDER=ollama\n'));
      console.log(chalk.white('Other settings live in'), chalk.cyan(configManager.getConfigFile()));
    } catch (error) {
      fail(undefined, error);
    }
  });

program.parseAsync().catch((error: unknown) => {
  console.error(chalk.red('\nError:'), errorMessage(error));
  process.exit(1);
});
