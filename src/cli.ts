#!/usr/bin/env node

import pc from 'picocolors';

import { asString, cliOverrides, friendlyError, parseArgs, printHelp } from './cli/args.js';
import { formatReport } from './cli/report.js';
import { ChatClient } from './client.js';
import { loadConfig, type ChatscopeConfig } from './config.js';
import { createLogger } from './log.js';
import type { ChatMessage, ChatRequest } from './types.js';

function buildRequest(config: ChatscopeConfig, prompt: string): ChatRequest {
  const messages: ChatMessage[] = [];
  if (config.system_prompt) messages.push({ role: 'system', content: config.system_prompt });
  messages.push({ role: 'user', content: prompt });
  return {
    model: config.model,
    messages,
    maxTokens: config.max_tokens,
    temperature: config.temperature,
    topP: config.top_p,
  };
}

async function main(argv: string[]): Promise<number> {
  const args = parseArgs(argv);
  if (args.flags.help === true) {
    printHelp();
    return 0;
  }

  const prompt = args._.join(' ').trim();
  if (!prompt) {
    printHelp();
    return 2;
  }

  const { config } = await loadConfig({
    configPath: asString(args.flags.config),
    overrides: cliOverrides(args),
  });
  const logger = createLogger({ verbose: config.verbose });
  const client = new ChatClient({
    endpoint: config.endpoint,
    apiKey: config.api_key,
    model: config.model,
    logger,
    telemetry: {
      enabled: config.telemetry,
      recordEvents: config.record_events,
      recordContent: config.record_content,
      logger,
      onReport: config.verbose ? (report) => console.error(formatReport(report)) : undefined,
    },
  });

  // Ctrl-C cancels the call; the report then shows it as cancelled.
  const ac = new AbortController();
  const onSigint = () => ac.abort();
  process.once('SIGINT', onSigint);

  try {
    const request = buildRequest(config, prompt);
    if (config.stream) {
      for await (const update of client.stream(request, { signal: ac.signal })) {
        for (const part of update.contentUpdate ?? []) {
          if (part.kind === 'text') process.stdout.write(part.text);
        }
        if (update.refusalUpdate) process.stdout.write(pc.yellow(update.refusalUpdate));
      }
      process.stdout.write('\n');
    } else {
      const completion = await client.complete(request, { signal: ac.signal });
      const message = completion.choices[0]?.message;
      process.stdout.write(`${message?.content ?? message?.refusal ?? ''}\n`);
    }
    return 0;
  } catch (e) {
    console.error(pc.red(friendlyError(e)));
    return ac.signal.aborted ? 130 : 1;
  } finally {
    process.off('SIGINT', onSigint);
    await client.close();
  }
}

main(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (e: unknown) => {
    console.error(pc.red(friendlyError(e)));
    process.exitCode = 1;
  }
);
