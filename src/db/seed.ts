import { createActivityClassifier, createOfflineLabeler } from '../agents/classification';
import { closeDatabase, initDatabase, query } from '../config/database';
import { loadConfigFromEnvironment } from '../config/settings';
import { createPgActivityStore } from '../services/activityStore';
import { createIngestionService } from '../services/ingestion';
import { createPgUserDirectory } from '../services/userDirectory';
import { createUser } from '../services/users';
import type { RawActivitySample, User } from '../types';

const DEMO_PASSWORD = 'password123';

// Samples a demo employee cycles through; browser titles stay Private offline
const DEMO_ACTIVITY: Array<Pick<RawActivitySample, 'state' | 'app' | 'title'>> = [
  { state: 'active', app: 'Visual Studio Code', title: 'ingestion.ts - activity-tracker' },
  { state: 'active', app: 'Slack', title: '#engineering' },
  { state: 'active', app: 'Figma', title: 'Dashboard redesign' },
  { state: 'active', app: 'Google Chrome', title: 'Pull requests' },
  { state: 'active', app: 'Spotify', title: 'Focus playlist' },
  { state: 'idle', app: null, title: null },
  { state: 'active', app: 'Terminal', title: 'npm test' },
  { state: 'active', app: 'Steam', title: 'Store' },
];

const SAMPLES_PER_EMPLOYEE = 240;
const SAMPLE_SECONDS = 30;

function buildSamples(day: Date): RawActivitySample[] {
  const start = new Date(day);
  start.setUTCHours(9, 0, 0, 0);

  return Array.from({ length: SAMPLES_PER_EMPLOYEE }, (_, i) => {
    const template = DEMO_ACTIVITY[Math.floor(i / 10) % DEMO_ACTIVITY.length];
    return {
      ...template,
      timestamp: new Date(start.getTime() + i * SAMPLE_SECONDS * 1000),
      duration: SAMPLE_SECONDS,
    };
  });
}

async function seed() {
  const config = loadConfigFromEnvironment();
  initDatabase(config.databaseUrl);

  try {
    console.log('Clearing existing data...');
    await query('DELETE FROM activity_logs');
    await query('DELETE FROM users');

    console.log('Creating users...');
    const ceo = await createUser({ email: 'ceo@example.com', password: DEMO_PASSWORD, role: 'ceo', fullName: 'Casey CEO' });
    await createUser({ email: 'hr@example.com', password: DEMO_PASSWORD, role: 'hr', fullName: 'Harper HR' });

    const employees: User[] = [];
    for (const team of [1, 2]) {
      const manager = await createUser({
        email: `manager.${team}@example.com`,
        password: DEMO_PASSWORD,
        role: 'manager',
        fullName: `Manager ${team}`,
        managerId: ceo.id,
      });

      for (const member of [1, 2, 3]) {
        employees.push(
          await createUser({
            email: `employee.${team}.${member}@example.com`,
            password: DEMO_PASSWORD,
            role: 'employee',
            fullName: `Employee ${team}.${member}`,
            title: 'Engineer',
            managerId: manager.id,
          })
        );
      }
    }

    console.log('Ingesting demo activity...');
    const ingestion = createIngestionService({
      config: {
        daemonApiKey: config.daemonApiKey,
        defaultSampleDurationSeconds: config.classification.defaultSampleDurationSeconds,
        concurrency: config.classification.concurrency,
      },
      classifier: createActivityClassifier({
        rules: config.classification.rules,
        labeler: createOfflineLabeler(),
      }),
      users: createPgUserDirectory(),
      store: createPgActivityStore(),
    });

    const today = new Date();
    for (const employee of employees) {
      const { recordsPersisted } = await ingestion.ingest(
        { employee_id: employee.employeeId, logs: buildSamples(today) },
        config.daemonApiKey
      );
      console.log(`  ${employee.email}: ${recordsPersisted} records`);
    }

    console.log(`\nDemo users created; every account uses the password "${DEMO_PASSWORD}"`);
    console.log('  CEO:      ceo@example.com');
    console.log('  HR:       hr@example.com');
    console.log('  Manager:  manager.1@example.com');
    console.log('  Employee: employee.1.1@example.com');
  } finally {
    await closeDatabase();
  }
}

seed()
  .then(() => process.exit(0))
  .catch((error) => {
    console.error('Seed failed:', error);
    process.exit(1);
  });
