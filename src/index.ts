import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import rateLimit from 'express-rate-limit';
import * as Sentry from '@sentry/node';
import { env } from './config/env';
import { loadDatasets } from './config/datasets';
import { logger } from './utils/logger';
import { errorMessage } from './utils/errors';
import { buildSystemPrompt } from './utils/prompts';
import { errorHandler } from './middleware/errorHandler';
import { createChatRouter } from './routes/chat.routes';
import { CatalogIndex } from './services/catalog.service';
import { RepairEstimationEngine, RepairRuleTable } from './services/repair.service';
import { JsonlLogSink } from './services/interactionLog.service';
import { ToolRegistry } from './services/tools/registry';
import { createTools } from './services/tools/definitions';
import { ToolDispatcher } from './services/dispatcher.service';
import { AnthropicService } from './services/anthropic.service';
import { ConversationOrchestrator } from './services/orchestrator.service';
import { SessionService } from './services/session.service';
import { AgentService } from './services/agent.service';
import { ReasoningBackend } from './types/agent';

// Initialize Sentry
if (env.SENTRY_DSN) {
  Sentry.init({
    dsn: env.SENTRY_DSN,
    environment: env.NODE_ENV,
    tracesSampleRate: env.NODE_ENV === 'production' ? 0.1 : 1.0,
  });
}

export interface AgentOverrides {
  backend?: ReasoningBackend;
  dataDir?: string;
  logDir?: string;
}

export function buildAgent(overrides: AgentOverrides = {}): AgentService {
  // A missing or malformed rule table throws here and stops the process.
  const datasets = loadDatasets(overrides.dataDir ?? env.DATA_DIR);

  const catalog = CatalogIndex.fromSources(datasets.houseItems, datasets.partnerRows);
  const repairs = new RepairEstimationEngine(RepairRuleTable.fromFile(datasets.repairRules));
  const logSink = new JsonlLogSink(overrides.logDir ?? env.LOG_DIR);

  const dispatcher = new ToolDispatcher(new ToolRegistry(createTools({ catalog, repairs, logSink })));
  const orchestrator = new ConversationOrchestrator(overrides.backend ?? new AnthropicService(), dispatcher, {
    systemPrompt: buildSystemPrompt(datasets.business, { repairIssues: repairs.listIssues() }),
    maxToolIterations: env.MAX_TOOL_ITERATIONS,
  });

  return new AgentService(orchestrator, new SessionService(env.SESSION_IDLE_TTL_MS));
}

export function createApp(agentService: AgentService): express.Express {
  const app = express();

  // Middleware
  app.use(helmet());
  app.use(cors());
  app.use(express.json());

  // Rate limiting
  const limiter = rateLimit({
    windowMs: 60 * 1000, // 1 minute
    max: 100,
    standardHeaders: true,
    legacyHeaders: false,
  });
  app.use('/api', limiter);

  // Routes
  app.use('/api/chat', createChatRouter(agentService));

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  // Error handler
  if (env.SENTRY_DSN) {
    Sentry.setupExpressErrorHandler(app);
  }
  app.use(errorHandler);

  return app;
}

// Start
function start() {
  try {
    const app = createApp(buildAgent());
    app.listen(parseInt(env.PORT), () => {
      logger.info(`Server running on port ${env.PORT}`, { env: env.NODE_ENV });
    });
  } catch (error) {
    logger.error('Failed to start server', { error: errorMessage(error) });
    process.exit(1);
  }
}

if (require.main === module) {
  start();
}
