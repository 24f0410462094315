#!/usr/bin/env node
import 'dotenv/config';
import readline from 'node:readline/promises';
import { stdin as input, stdout as output } from 'node:process';
import chalk from 'chalk';
import { formatFieldValue } from './core/clarifier.js';
import { toStdError } from './core/errors.js';
import { generateSessionId } from './core/session_manager.js';
import { createRuntime } from './runtime.js';
import { SLOT_ORDER, type TravelRequirementsT } from './schemas/requirements.js';
import { createLogger } from './util/logging.js';

if (!process.env.LOG_LEVEL) process.env.LOG_LEVEL = 'warn';

const rl = readline.createInterface({ input, output });
const log = createLogger();
const runtime = createRuntime(log);
let sessionId = generateSessionId();

const FRAME_BAR = '─'.repeat(44);

type Styler = (value: string) => string;

const identity: Styler = (value: string) => value;

interface BlockParts {
  top: string;
  body: string;
  bottom: string;
}

function createBlock(title: string, message: string, accent: Styler, body: Styler): BlockParts {
  const lines = message.split('\n').map((line) => (line.length === 0 ? ' ' : line));
  const topPlain = `┌─ ${title.toUpperCase()} ${FRAME_BAR}`;
  const bottomPlain = `└${'─'.repeat(Math.max(topPlain.length - 1, 0))}`;
  const prefixed = lines
    .map((line) => `${accent('│')} ${body(line)}`)
    .join('\n');
  return {
    top: accent(topPlain),
    body: prefixed,
    bottom: accent(bottomPlain),
  };
}

function printBlock(block: BlockParts) {
  console.log();
  console.log(block.top);
  if (block.body.length > 0) console.log(block.body);
  console.log(block.bottom);
}

const CONFIDENCE_STYLE: Record<string, Styler> = {
  CONFIRMED: chalk.green,
  TENTATIVE: chalk.yellow,
  UNSET: chalk.gray,
};

function renderState(req: TravelRequirementsT): string {
  const lines = SLOT_ORDER.map((field) => {
    const slot = req[field];
    const style = CONFIDENCE_STYLE[slot.confidence] ?? identity;
    return `${field.padEnd(14)} ${style(slot.confidence.padEnd(10))} ${formatFieldValue(field, req) ?? '-'}`;
  });
  lines.push(`${'preferences'.padEnd(14)} ${req.preferences.join(', ') || '-'}`);
  lines.push(`${'status'.padEnd(14)} ${req.status === 'COMPLETE' ? chalk.green(req.status) : req.status}`);
  return lines.join('\n');
}

class Spinner {
  private readonly frames = ['⠋', '⠙', '⠹', '⠸', '⠼', '⠴', '⠦', '⠧', '⠇', '⠏'];
  private interval: NodeJS.Timeout | null = null;
  private currentFrame = 0;

  start(status: string) {
    this.currentFrame = 0;
    if (this.interval) clearInterval(this.interval);
    this.interval = setInterval(() => {
      const frame = chalk.yellow(this.frames[this.currentFrame]);
      process.stdout.write(`\r\x1b[2K${chalk.gray('│')} ${frame} ${chalk.gray(status)}`);
      this.currentFrame = (this.currentFrame + 1) % this.frames.length;
    }, 80);
  }

  stop() {
    if (this.interval) {
      clearInterval(this.interval);
      this.interval = null;
      process.stdout.write('\r'.padEnd(50, ' ') + '\r');
    }
  }
}

async function main() {
  console.log(chalk.yellow.bold('✈️  Trip intake: tell me about the trip you are planning.'));
  console.log(chalk.gray('─'.repeat(60)));
  console.log(chalk.blue('Commands: /state (collected details), /reset (start over), /exit (quit)'));
  console.log(chalk.gray('─'.repeat(60)));

  const spinner = new Spinner();
  let lastState: TravelRequirementsT | undefined;

  while (true) {
    const q = await rl.question(chalk.blue.bold('\nYou> '));
    const command = q.trim().toLowerCase();
    if (command === '/exit' || command === 'exit') break;

    if (command === '/reset') {
      await runtime.store.clear(sessionId);
      sessionId = generateSessionId();
      lastState = undefined;
      console.log(chalk.gray('Started a new conversation.'));
      continue;
    }

    if (command === '/state') {
      const session = await runtime.store.get(sessionId);
      const state = session?.requirements ?? lastState;
      printBlock(createBlock('State', state ? renderState(state) : 'Nothing collected yet.', chalk.magenta, identity));
      if (session) console.log(chalk.gray(`trust ${session.trustScore.toFixed(2)}`));
      continue;
    }

    printBlock(createBlock('You', q, chalk.blueBright, chalk.white));

    spinner.start('Thinking...');
    try {
      const res = await runtime.orchestrator.handleTurn({ sessionId, text: q });
      spinner.stop();
      lastState = res.requirements;
      printBlock(createBlock('Assistant', res.reply, chalk.greenBright, identity));
      if (res.readyForHandoff) {
        console.log(chalk.green('✔ Requirements complete and ready for handoff.'));
      }
    } catch (error) {
      spinner.stop();
      const std = toStdError(error, 'cli');
      console.log(chalk.red(`❌ ${std.message}`));
    }
  }
  rl.close();
  await runtime.close();
}

main().catch((e) => (console.error(e), process.exit(1)));
