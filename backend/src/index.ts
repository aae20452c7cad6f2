import dotenv from 'dotenv';
import { buildApp } from './app.js';
import { loadConfig } from './config.js';
import { initializeFirebase } from './services/firebase.js';
import { createFirestoreStores } from './services/firestore.js';

// Load environment variables
dotenv.config();

const config = loadConfig();
const { firestore, verifier } = initializeFirebase(config.firebase);

const fastify = await buildApp({
  config,
  stores: createFirestoreStores(firestore),
  verifier,
});

// Start server
const start = async () => {
  try {
    await fastify.listen({ port: config.port, host: config.host });
    fastify.log.info(`Backend server running on http://localhost:${config.port}`);
    fastify.log.info(`Health check: http://localhost:${config.port}/health`);
  } catch (err) {
    fastify.log.error(err);
    process.exit(1);
  }
};

await start();
