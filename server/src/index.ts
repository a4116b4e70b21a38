import 'dotenv/config';
import { createApp } from './app.js';
import { loadConfig } from './config.js';
import { SQLiteRepository } from './db/sqlite.js';

const config = loadConfig();

// Initialize repository. The store holds a single writer lock: run one server per database.
const repo = new SQLiteRepository(config.dbPath);
repo.init();

const app = createApp({ repo, match: config.match });

// ---------- start ----------

const server = app.listen(config.port, () => {
    console.log(`shelfmerge server running on http://localhost:${config.port}`);
    console.log(
        `Matching thresholds: strict ${config.match.strictThreshold}, loose ${config.match.looseThreshold}`
    );
});

function shutdown(signal: string): void {
    console.log(`${signal} received, closing database`);
    server.close(() => {
        repo.close();
        process.exit(0);
    });
}

process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));
