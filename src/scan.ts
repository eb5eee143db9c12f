#!/usr/bin/env node
import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { RadarModule } from './radar/radar.module';
import { ScanPipelineService } from './radar/services/scan-pipeline.service';

async function main(): Promise<number> {
  const app = await NestFactory.createApplicationContext(RadarModule);
  const controller = new AbortController();
  // first Ctrl-C finishes in-flight articles, the second one exits immediately
  const onSigint = (): void => {
    if (controller.signal.aborted) {
      process.exit(130);
    }
    controller.abort();
  };
  process.on('SIGINT', onSigint);

  try {
    const summary = await app
      .get(ScanPipelineService)
      .run({ signal: controller.signal });
    process.stdout.write(`${JSON.stringify(summary, null, 2)}\n`);
    return 0;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    new Logger('Scan').error(`run failed: ${message}`);
    return 1;
  } finally {
    process.off('SIGINT', onSigint);
    await app.close();
  }
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    new Logger('Scan').error(error instanceof Error ? error.message : String(error));
    process.exitCode = 1;
  });
