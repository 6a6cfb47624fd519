import { loadConfig } from '../../config.js';
import { createPool } from '../db/pool.js';
import { runMigrations } from '../db/migrate.js';
import { createSmtpTransport } from '../mail/contactRelay.js';
import { createApp } from './app.js';

async function main(): Promise<void> {
  const config = loadConfig();
  const pool = createPool(config.databaseUrl);

  const applied = await runMigrations(pool);
  console.log(
    applied.length === 0 ? 'Schema up to date.' : `Applied ${applied.length} migration(s).`
  );

  const app = createApp({
    config,
    pool,
    mailTransport: createSmtpTransport(config.mail),
  });

  if (!config.mail.address || !config.mail.password) {
    console.warn('MAIL_ADDRESS / MAIL_APP_PASSWORD not set; contact messages will not be relayed.');
  }

  app.listen(config.port, () => {
    console.log(`Server running on http://localhost:${config.port}`);
    console.log(`Health check: http://localhost:${config.port}/healthz`);
  });
}

main().catch((error: unknown) => {
  console.error('Failed to start server:', error);
  process.exit(1);
});
