import dotenv from 'dotenv';
dotenv.config();

import { createApp } from './app';
import { loadConfig } from './config';
import { createServices } from './container';
import { createMailTransport, verifyMailTransport } from './mailer';
import { loadLookupTable } from './modules/healthScore/lookupTable';
import { errorMessage, safeLogger } from './security/safeLogger';

async function main() {
  const config = loadConfig();
  const lookups = await loadLookupTable(config.answerMapPath);

  const mailTransport = config.smtp ? createMailTransport(config.smtp) : null;
  if (mailTransport && config.smtp) {
    await verifyMailTransport(mailTransport, config.smtp);
  }

  const services = createServices(config, lookups, { mailTransport });
  const app = createApp(services);

  app.listen(config.port, () => {
    safeLogger.info('server.started', { port: config.port });
  });
}

main().catch((err) => {
  safeLogger.error('server.start.failed', { reason: errorMessage(err) });
  process.exit(1);
});
