import express from 'express';
import cors from 'cors';
import { createActivityClassifier, createLabelerFromConfig } from './agents/classification';
import { initDatabase, testConnection } from './config/database';
import { AppConfig, loadConfigFromEnvironment } from './config/settings';
import { HttpError } from './errors';
import { Auth, createAuth } from './middleware/auth';
import { createPgActivityStore } from './services/activityStore';
import { createIngestionService, IngestionService } from './services/ingestion';
import { createPgUserDirectory } from './services/userDirectory';

// Import routes
import { createActivityRouter } from './routes/activity';
import { createAdminRouter } from './routes/admin';
import { createAuthRouter } from './routes/auth';
import { createDashboardRouter } from './routes/dashboard';
import { createUsersRouter } from './routes/users';

export interface AppDependencies {
  config: AppConfig;
  ingestion: IngestionService;
  auth: Auth;
}

function bodyParserStatus(err: unknown): number | null {
  if (typeof err !== 'object' || err === null || !('type' in err)) return null;
  if (err.type === 'entity.parse.failed') return 400;
  if (err.type === 'entity.too.large') return 413;
  return null;
}

export function createApp({ config, ingestion, auth }: AppDependencies): express.Express {
  const app = express();

  // Middleware
  app.use(cors());
  app.use(express.json({ limit: '5mb' }));

  // Request logging
  app.use((req, _res, next) => {
    console.log(`${new Date().toISOString()} ${req.method} ${req.path}`);
    next();
  });

  // Health check
  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  // API Routes
  app.use('/api/v1/activity', createActivityRouter(ingestion));
  app.use('/api/v1/auth', createAuthRouter(auth));
  app.use('/api/v1/users', createUsersRouter(auth));
  app.use('/api/v1/dashboard', createDashboardRouter(auth));
  app.use('/api/v1/admin', createAdminRouter(auth));

  // Root endpoint with API documentation
  app.get('/', (_req, res) => {
    res.json({
      name: 'Activity Tracker API',
      version: '1.0.0',
      endpoints: {
        daemon: {
          'POST /api/v1/activity': 'Submit a batch of activity samples (X-API-Key header)',
        },
        auth: {
          'POST /api/v1/auth/login': 'Authenticate and get JWT token',
        },
        users: {
          'GET /api/v1/users/me': 'Get current user info',
          'PUT /api/v1/users/me/password': 'Change own password',
        },
        dashboard: {
          'GET /api/v1/dashboard/me': 'Own productivity report',
          'GET /api/v1/dashboard/team': 'Team report (managers)',
          'GET /api/v1/dashboard/team/:employeeId': 'Direct report drill-down (managers)',
          'GET /api/v1/dashboard/company': 'Company report (CEO)',
        },
        admin: {
          'POST /api/v1/admin/users': 'Create a user',
          'GET /api/v1/admin/users': 'List users',
          'PUT /api/v1/admin/users/:id': 'Update role, manager or title',
          'DELETE /api/v1/admin/users/:id': 'Remove a user',
          'PUT /api/v1/admin/users/:id/password': 'Reset a password',
          'GET /api/v1/admin/installers/:employeeId': 'Authorize a daemon installer',
          'GET /api/v1/admin/teams': 'List teams',
        },
      },
      authentication: 'Use Bearer token in Authorization header',
    });
  });

  // Error handling middleware
  app.use((err: unknown, req: express.Request, res: express.Response, next: express.NextFunction) => {
    if (res.headersSent) {
      next(err);
      return;
    }

    if (err instanceof HttpError) {
      if (err.statusCode >= 500) {
        console.error(`${req.method} ${req.path} failed:`, err);
      }
      res.status(err.statusCode).json({ error: err.message, ...err.details });
      return;
    }

    const parserStatus = bodyParserStatus(err);
    if (parserStatus) {
      res.status(parserStatus).json({ error: parserStatus === 413 ? 'Payload too large' : 'Malformed JSON body' });
      return;
    }

    console.error('Unhandled error:', err);
    res.status(500).json({
      error: 'Internal server error',
      message: config.nodeEnv === 'development' && err instanceof Error ? err.message : undefined,
    });
  });

  // 404 handler
  app.use((_req, res) => {
    res.status(404).json({ error: 'Not found' });
  });

  return app;
}

export function createDefaultDependencies(config: AppConfig): AppDependencies {
  const classifier = createActivityClassifier({
    rules: config.classification.rules,
    labeler: createLabelerFromConfig(config.ai),
  });

  const ingestion = createIngestionService({
    config: {
      daemonApiKey: config.daemonApiKey,
      defaultSampleDurationSeconds: config.classification.defaultSampleDurationSeconds,
      concurrency: config.classification.concurrency,
    },
    classifier,
    users: createPgUserDirectory(),
    store: createPgActivityStore(),
  });

  return { config, ingestion, auth: createAuth(config.auth) };
}

// Start server
async function start(): Promise<void> {
  const config = loadConfigFromEnvironment();
  initDatabase(config.databaseUrl);

  // Test database connection
  const dbConnected = await testConnection();
  if (!dbConnected) {
    console.error('Failed to connect to database. Please check your configuration.');
    process.exit(1);
  }

  const app = createApp(createDefaultDependencies(config));

  app.listen(config.port, () => {
    console.log(`\n🚀 Server running on http://localhost:${config.port}`);
    console.log(`   Classification concurrency: ${config.classification.concurrency}`);
    console.log(`   Default sample duration: ${config.classification.defaultSampleDurationSeconds}s`);
  });
}

if (require.main === module) {
  start().catch((error: unknown) => {
    console.error('Failed to start server:', error);
    process.exit(1);
  });
}
