import 'dotenv/config';
import { buildApp } from './app.js';
import { createWorkContext } from './context.js';
import { getWorkManagerConfig } from './lib/config/work-manager.js';
import { MemoryRecordSink, recordUpsertType, researchBriefType } from './order-types/index.js';

const sink = new MemoryRecordSink();

const context = createWorkContext({
  config: getWorkManagerConfig(),
  orderTypes: [recordUpsertType(sink), researchBriefType(sink)],
});

const fastify = await buildApp({ context });

fastify.addHook('onClose', async () => {
  context.close();
});

const start = async () => {
  try {
    const port = parseInt(process.env.PORT || '3000', 10);
    const host = process.env.HOST || '0.0.0.0';
    await fastify.listen({ port, host });
  } catch (err) {
    fastify.log.error(err);
    process.exit(1);
  }
};

await start();
