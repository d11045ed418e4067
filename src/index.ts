#!/usr/bin/env node

import { Server } from 'http';
import { ExitCode, run } from './cli';
import { AssetServerOptions, startAssetServer } from './server';

async function serveUntilSignal(rootDir: string, port: number, options: AssetServerOptions): Promise<Server> {
  const server = await startAssetServer(rootDir, port, options);

  const shutdown = () => {
    server.close(() => process.exit(ExitCode.Success));
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);

  return server;
}

// A timed-out run can leave fs calls pending, so failures exit explicitly
run(process.argv.slice(2), process.env, { startServer: serveUntilSignal })
  .then((code) => {
    if (code !== ExitCode.Success) {
      process.exit(code);
    }
  })
  .catch((error: unknown) => {
    console.error('Fatal error:', error);
    process.exit(ExitCode.Unexpected);
  });
