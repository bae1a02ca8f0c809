/**
 * Seating Engine Server
 *
 * Main entry point: reads configuration from the environment, loads the
 * demo floor plan when SEED is on, and starts listening.
 */

import { loadConfig } from "./config";
import { buildApp } from "./app";
import { seedData } from "./tests/seed-data";

const start = async () => {
    const config = loadConfig();
    const { app, store } = await buildApp({ config });

    if (config.seed) {
        await store.loadSeed(seedData);
        app.log.info({ tables: seedData.tables.length }, 'seed data loaded');
    }

    try {
        await app.listen({ port: config.port, host: config.host });
    } catch (err) {
        app.log.error(err);
        process.exit(1);
    }
}

start().catch(err => {
    console.error(err);
    process.exit(1);
});
