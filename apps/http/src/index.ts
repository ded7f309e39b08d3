// apps/http/src/index.ts
import { loadConfig } from '@wikireplica/core';
import { buildApp } from './app';

async function main() {
  const config = loadConfig();
  const app = await buildApp({ config });

  app.log.info(
    {
      domain: config.domainSuffix,
      credentials: config.credentialsFile,
      poolSize: config.poolSize
    },
    'replica-config'
  );

  const onShutdown = async (signal: string) => {
    app.log.info({ signal }, 'shutting-down');
    try {
      // onClose ends every replica engine
      await app.close();
    } catch (err) {
      app.log.error({ err }, 'shutdown-failed');
    } finally {
      process.exit(0);
    }
  };
  process.on('SIGINT', () => { void onShutdown('SIGINT'); });
  process.on('SIGTERM', () => { void onShutdown('SIGTERM'); });

  await app.listen({ port: config.http.port, host: config.http.host });
}

main().catch((err) => {
  // eslint-disable-next-line no-console
  console.error('Fatal boot error', err);
  process.exit(1);
});
