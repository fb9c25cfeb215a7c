#!/usr/bin/env node
import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { runCommand } from './cli/commands';

async function bootstrap() {
  const app = await NestFactory.createApplicationContext(AppModule, {
    logger: process.env.NODE_ENV === 'development' ? ['log', 'warn', 'error', 'debug'] : ['warn', 'error'],
  });

  const exitCode = await runCommand(app, process.argv.slice(2));
  await app.close();
  process.exitCode = exitCode;
}

bootstrap().catch((error) => {
  console.error('Failed to start:', error);
  process.exitCode = 1;
});
