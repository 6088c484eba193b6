import { Pool } from 'pg';
import fs from 'fs';
import path from 'path';
import { loadConfigFromEnvironment } from '../config/settings';

async function setup() {
  const config = loadConfigFromEnvironment();
  const databaseUrl = new URL(config.databaseUrl);
  const databaseName = decodeURIComponent(databaseUrl.pathname.replace(/^\//, ''));

  if (!/^[A-Za-z0-9_]+$/.test(databaseName)) {
    throw new Error(`Refusing to create database with unexpected name "${databaseName}"`);
  }

  // First connect to the default database to create ours
  const adminUrl = new URL(databaseUrl.toString());
  adminUrl.pathname = '/postgres';
  const adminPool = new Pool({ connectionString: adminUrl.toString() });

  try {
    const dbCheck = await adminPool.query('SELECT 1 FROM pg_database WHERE datname = $1', [databaseName]);

    if (dbCheck.rowCount === 0) {
      console.log(`Creating database ${databaseName}...`);
      await adminPool.query(`CREATE DATABASE ${databaseName}`);
      console.log('Database created successfully');
    } else {
      console.log(`Database ${databaseName} already exists`);
    }
  } finally {
    await adminPool.end();
  }

  const pool = new Pool({ connectionString: config.databaseUrl });

  try {
    // Read and execute schema
    const schemaPath = path.join(__dirname, 'schema.sql');
    const schema = fs.readFileSync(schemaPath, 'utf-8');

    console.log('Running schema...');
    await pool.query(schema);
    console.log('Schema created successfully');

    // Verify tables
    const tables = await pool.query<{ table_name: string }>(`
      SELECT table_name
      FROM information_schema.tables
      WHERE table_schema = 'public'
      ORDER BY table_name
    `);

    console.log('\nCreated tables:');
    tables.rows.forEach((row) => {
      console.log(`  - ${row.table_name}`);
    });
  } finally {
    await pool.end();
  }
}

setup()
  .then(() => {
    console.log('\nDatabase setup complete!');
    process.exit(0);
  })
  .catch((error) => {
    console.error('Setup failed:', error);
    process.exit(1);
  });
