import 'reflect-metadata';
import 'dotenv/config';
import { NestFactory } from '@nestjs/core';
import chalk from 'chalk';
import { AppModule } from './app.module';
import { resolveLogLevels } from './logger/log-levels';

const PORT = process.env.PORT || 5500;

async function bootstrap() {
  const app = await NestFactory.create(AppModule, {
    logger: resolveLogLevels(process.env.LOG_LEVEL),
  });
  app.enableShutdownHooks();
  await app.listen(PORT, () =>
    console.log(
      chalk.green(`app is running on :${PORT} / ${new Date().toISOString()}`),
    ),
  );
}

bootstrap().catch((error: unknown) => {
  console.error(chalk.red('❌ Не удалось запустить приложение'), error);
  process.exit(1);
});
