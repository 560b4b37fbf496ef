#!/usr/bin/env node
/**
 * api-workbench - interactive request runner
 *
 * Picks a project, shows its requests as a menu and runs the chosen one.
 * Ctrl+C cancels a request in flight; at the prompt it quits.
 */

import * as path from 'path';
import * as readline from 'readline/promises';
import {
  ExchangeArchiveSink,
  JsonLinesSink,
  ProjectSession,
  ResponseLogger,
  createDefaultRegistry,
  discoverProjects,
  loadProject,
  type LogSink,
} from '../engine';
import { config } from '../shared/config';
import { toErrorMessage } from '../shared/error-utils';
import { createLogger } from '../shared/logger';
import { USAGE, parseCliArgs } from './cli-args';
import { QUIT_KEY, buildMenu, findMenuEntry, formatMenu } from './menu';
import { runMonitorEntry } from './monitor-entry';
import { formatResult, formatSending } from './result-format';

const logger = createLogger('CLI');

async function chooseProjectDir(rl: readline.Interface, projectDir: string | undefined): Promise<string> {
  if (projectDir) return projectDir;

  const root = config.projects.rootDir;
  const found = discoverProjects(root);
  if (found.length === 0) {
    throw new Error(`No ${config.projects.fileName} found in ${path.resolve(root)} or its sub-directories`);
  }
  if (found.length === 1) return found[0].dir;

  console.log('Projects:');
  found.forEach((project, index) => console.log(`  ${index}) ${project.name} (${project.dir})`));

  for (;;) {
    const answer = (await rl.question('Select project: ')).trim();
    const choice = found[Number(answer)];
    if (answer !== '' && choice) return choice.dir;
    console.log(`Enter a number between 0 and ${found.length - 1}`);
  }
}

function createSinks(outputDir: string): LogSink[] {
  const sinks: LogSink[] = [new JsonLinesSink(path.join(outputDir, config.output.logFileName))];
  if (config.output.archiveExchanges) {
    sinks.push(new ExchangeArchiveSink(outputDir));
  }
  return sinks;
}

async function main(argv: readonly string[]): Promise<number> {
  const args = parseCliArgs(argv);
  if (args.help) {
    console.log(USAGE);
    return 0;
  }

  const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
  let session: ProjectSession | null = null;
  let inFlight: AbortController | null = null;

  rl.on('SIGINT', () => {
    if (inFlight) {
      inFlight.abort();
      return;
    }
    session?.stopMonitors();
    rl.close();
    process.exit(130);
  });

  try {
    const project = loadProject(await chooseProjectDir(rl, args.projectDir), createDefaultRegistry());
    session = new ProjectSession({ project, responseLogger: new ResponseLogger(createSinks(project.outputDir)) });
    const menu = buildMenu(project.requests);

    for (;;) {
      console.log(formatMenu(project.name, menu, session.menuHint()));
      const answer = (await rl.question('> ')).trim().toLowerCase();
      if (answer === QUIT_KEY) break;

      const entry = findMenuEntry(menu, answer);
      if (!entry) {
        console.log(`No request for "${answer}"`);
        continue;
      }

      const definition = entry.definition;
      if (definition.kind === 'http') {
        console.log(formatSending(definition));
        inFlight = new AbortController();
        try {
          const result = await session.run(definition, { signal: inFlight.signal });
          formatResult(result).forEach(line => console.log(line));
        } catch (err: unknown) {
          // The result could not be written to the log; the request itself ran
          console.error(toErrorMessage(err));
        } finally {
          inFlight = null;
        }
        continue;
      }

      await runMonitorEntry(session, definition, {
        print: line => console.log(line),
        waitForStop: () => rl.question('Monitoring, press Enter to stop\n'),
      });
    }

    return 0;
  } finally {
    session?.stopMonitors();
    rl.close();
  }
}

main(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    logger.error(toErrorMessage(err));
    process.exitCode = 1;
  },
);
