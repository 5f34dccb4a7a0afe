import fs from 'fs';
import path from 'path';
import { Pool } from 'pg';
import { TransactionManager } from './transaction.manager';

const TAG = '[migrate]';
export const MIGRATIONS_DIR = path.resolve(__dirname, '../../migrations');

/** Applies every *.sql file in name order that has not been recorded yet. */
export async function runMigrations(pool: Pool, dir: string = MIGRATIONS_DIR): Promise<string[]> {
    await pool.query(
        `CREATE TABLE IF NOT EXISTS gateway_migrations (
            name TEXT PRIMARY KEY,
            applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
        )`,
    );

    const files = fs.readdirSync(dir).filter(f => f.endsWith('.sql')).sort();
    const res = await pool.query<{ name: string }>('SELECT name FROM gateway_migrations');
    const applied = new Set(res.rows.map(r => r.name));
    const tx = new TransactionManager(pool);
    const ran: string[] = [];

    for (const file of files) {
        if (applied.has(file)) continue;
        const sql = fs.readFileSync(path.join(dir, file), 'utf-8');
        await tx.run(async (client) => {
            await client.query(sql);
            await client.query('INSERT INTO gateway_migrations (name) VALUES ($1)', [file]);
        });
        console.log(`${TAG} applied ${file}`);
        ran.push(file);
    }

    return ran;
}
