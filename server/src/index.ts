import { serve } from '@hono/node-server';
import { createApp } from './hono-app';
import { parseCommandLine, readRuntimeEnvironment, resolveServerOptions, USAGE } from './services/config';
import { DefaultModelFileReader, LocalModelLocator } from './services/storage';
import { ConfigArchitectureInspector } from './services/architecture';
import { resolveModel } from './services/pipeline';
import { providerRegistry } from './providers';
import type { RuntimeModel } from './models';
import logger from './lib/logger';

async function main(argv: string[]): Promise<void> {
  const commandLine = parseCommandLine(argv);
  if (commandLine.help) {
    process.stdout.write(`${USAGE}\n`);
    return;
  }

  const options = resolveServerOptions(commandLine);
  const env = readRuntimeEnvironment();
  const reader = new DefaultModelFileReader({ endpoint: env.hfEndpoint, token: env.hfToken });

  const model = await resolveModel(options, {
    locator: new LocalModelLocator(),
    inspector: new ConfigArchitectureInspector(reader),
    isEngineAvailable: () => providerRegistry.isEngineAvailable(),
    factory: { reader, providers: providerRegistry },
  });

  try {
    await model.load();
  } catch (error) {
    // A generation server may already be running
    await model.stop();
    throw error;
  }

  const models: RuntimeModel[] = model.ready ? [model] : [];
  const app = createApp(models);

  const server = serve({ fetch: app.fetch, port: options.httpPort }, (info) => {
    logger.info(
      { port: info.port, model: model.name, task: model.task, backend: model.backend, ready: model.ready },
      `🚀 Model server listening on port ${info.port}`
    );
  });

  const shutdown = (signal: string) => {
    logger.info({ signal }, 'Shutting down model server');
    server.close();
    model
      .stop()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        logger.error({ error }, 'Failed to stop model cleanly');
        process.exit(1);
      });
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

main(process.argv.slice(2)).catch((error: unknown) => {
  const message = error instanceof Error ? error.message : String(error);
  logger.error({ error }, `Failed to start model server: ${message}`);
  process.exit(1);
});
