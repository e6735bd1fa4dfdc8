import 'dotenv/config';
import { loadConfig } from './config';
import LeaderboardServer from './server';

const server = new LeaderboardServer(loadConfig());

function stop(): void {
  server
    .shutdown()
    .then(() => process.exit(0))
    .catch((error: unknown) => {
      console.error('Error during shutdown:', error);
      process.exit(1);
    });

  // Force exit after 10 seconds if graceful shutdown hangs
  setTimeout(() => {
    console.error('Forced shutdown after timeout');
    process.exit(1);
  }, 10000).unref();
}

server
  .start()
  .then(() => {
    process.on('SIGINT', stop);
    process.on('SIGTERM', stop);
  })
  .catch((error: unknown) => {
    console.error('Failed to start server:', error);
    process.exit(1);
  });
