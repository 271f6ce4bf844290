import * as portfinder from 'portfinder';
import { createEngine } from './engine';
import { createServer } from './infrastructure/server/server';
import { removeDaemonInfo, writeDaemonInfo } from './utils/daemon';

async function bootstrap() {
  try {
    const controller = createEngine();
    const server = createServer(controller);

    // Find a free port
    const port = await portfinder.getPortPromise({ port: 30000 });

    await server.listen({ port, host: '127.0.0.1' });
    console.log(`Server listening on http://localhost:${port}`);

    const projectRoot = process.cwd();
    await writeDaemonInfo(projectRoot, { port, pid: process.pid });

    const shutdown = async () => {
      console.log('Shutting down...');
      await removeDaemonInfo(projectRoot);
      await server.close();
      process.exit(0);
    };
    const onSignal = () => {
      shutdown().catch((error: unknown) => {
        console.error('Failed to shut down cleanly:', error);
        process.exit(1);
      });
    };

    process.on('SIGINT', onSignal);
    process.on('SIGTERM', onSignal);
  } catch (error) {
    console.error('Failed to start server:', error);
    process.exit(1);
  }
}

void bootstrap();
