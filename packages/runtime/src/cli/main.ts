import { stdin as input, stdout as output } from 'node:process';
import { createInterface, type Interface } from 'node:readline/promises';
import { config as loadEnv } from 'dotenv';
import { UnknownChildError } from '@worksheetbot/core';
import { createWorksheetBot, type WorksheetBot } from '../bot';
import { resolveConfig } from '../config/resolveConfig';
import { CHILD_PROFILES, findChildProfile } from '../prompts/children';
import { formatChatResult, formatWorksheetResult, isExitCommand } from './format';

export type CliMode = 'worksheet' | 'chat';

export function parseMode(argv: readonly string[]): CliMode {
  return argv.includes('--chat') ? 'chat' : 'worksheet';
}

async function askChild(rl: Interface): Promise<string> {
  const names = CHILD_PROFILES.map((profile) => profile.name);
  const fallback = names[0] ?? '';

  for (;;) {
    const answer = (await rl.question(`Which child are we creating this worksheet for? (${names.join(' or ')}): `)).trim();
    try {
      return findChildProfile(answer || fallback).name;
    } catch (error) {
      if (!(error instanceof UnknownChildError)) throw error;
      console.log(error.message);
    }
  }
}

async function loop(bot: WorksheetBot, rl: Interface, mode: CliMode): Promise<void> {
  const sessionId = bot.config.sessionId;
  const child = mode === 'worksheet' ? await askChild(rl) : undefined;

  for (;;) {
    const request = (await rl.question('\nYou: ')).trim();
    if (isExitCommand(request)) return;
    if (!request) continue;

    const reply = child === undefined
      ? formatChatResult(await bot.service.chat({ sessionId, request }))
      : formatWorksheetResult(await bot.service.generateWorksheet({ sessionId, child, request }));

    console.log(`\nWorksheetBot:\n\n${reply}`);
  }
}

export async function runCli(argv: readonly string[] = process.argv.slice(2)): Promise<void> {
  loadEnv();
  const mode = parseMode(argv);
  const bot = createWorksheetBot(resolveConfig());
  await bot.start();

  const rl = createInterface({ input, output });
  try {
    console.log(mode === 'chat'
      ? "WorksheetBot is ready to chat! (type 'quit' to exit)"
      : "WorksheetBot is ready - let's make a worksheet! (type 'quit' to exit)");
    await loop(bot, rl, mode);
  } finally {
    rl.close();
    await bot.close();
  }
}
