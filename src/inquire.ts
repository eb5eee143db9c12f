#!/usr/bin/env node
import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { createInterface } from 'node:readline';
import { runInquirySession } from './radar/cli/inquiry-session';
import { RadarModule } from './radar/radar.module';
import { InquisitorService } from './radar/services/inquisitor.service';

async function main(): Promise<void> {
  const app = await NestFactory.createApplicationContext(RadarModule, {
    logger: ['error', 'warn'],
  });
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  rl.setPrompt('radar> ');
  process.stdout.write('Ask about the stored articles. Type "exit" to leave.\n');

  try {
    await runInquirySession(app.get(InquisitorService), {
      lines: rl,
      write: (text) => process.stdout.write(text),
      prompt: () => rl.prompt(),
    });
  } finally {
    rl.close();
    await app.close();
  }
}

main().catch((error: unknown) => {
  new Logger('Inquire').error(error instanceof Error ? error.message : String(error));
  process.exitCode = 1;
});
