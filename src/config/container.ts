import { BillDirectory, FirestoreBillDirectory, MemoryBillDirectory } from '../helpers/billDirectory';
import { FirestoreResultStore } from '../helpers/firestoreResultStore';
import { InflightCoordinator } from '../helpers/inflightCoordinator';
import { MemoryResultStore } from '../helpers/memoryResultStore';
import { OpenAIReasoningService } from '../helpers/openaiReasoningService';
import { QueryOrchestrator } from '../helpers/queryOrchestrator';
import { ReasoningClient } from '../helpers/reasoningClient';
import { ResultStore } from '../helpers/resultStore';
import { Query } from '../types';
import { logger } from '../utils/logger';
import { DEFAULT_CONSTRAINTS, ValidationConstraints } from '../utils/validator';
import { getDb } from './firestore';
import { Settings } from './settings';

/**
 * Process-scoped service graph, built once at startup
 */
export interface Container {
  settings: Settings;
  constraints: ValidationConstraints;
  store: ResultStore;
  bills: BillDirectory;
  coordinator: InflightCoordinator<Query>;
  orchestrator: QueryOrchestrator;
}

export function createContainer(settings: Settings): Container {
  logger.setLevel(settings.logLevel);

  const constraints: ValidationConstraints = {
    ...DEFAULT_CONSTRAINTS,
    maxPageSize: settings.history.maxPageSize,
  };

  let store: ResultStore;
  let bills: BillDirectory;
  if (settings.store === 'memory') {
    store = new MemoryResultStore(settings.cache.ttlSeconds);
    bills = new MemoryBillDirectory();
  } else {
    const db = getDb();
    store = new FirestoreResultStore(db, settings.cache.ttlSeconds);
    bills = new FirestoreBillDirectory(db);
  }

  if (!settings.reasoning.apiKey) {
    logger.warn('reasoning_credential_missing', {
      detail: 'OPENAI_API_KEY is not set; submissions will fail with an authentication error',
    });
  }

  const service = new OpenAIReasoningService({
    model: settings.reasoning.model,
    apiKey: settings.reasoning.apiKey,
  });
  const client = new ReasoningClient(service, settings.retry);
  const coordinator = new InflightCoordinator<Query>();

  const orchestrator = new QueryOrchestrator({
    store,
    bills,
    client,
    coordinator,
    model: settings.reasoning.model,
    constraints,
  });

  logger.info('container_ready', {
    store: settings.store,
    model: settings.reasoning.model,
    cacheTtlSeconds: settings.cache.ttlSeconds,
    maxAttempts: settings.retry.maxAttempts,
  });

  return { settings, constraints, store, bills, coordinator, orchestrator };
}
