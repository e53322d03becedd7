import { JobRunner } from '../services/jobRunner.js';
import { IngestionService } from '../services/ingestionService.js';
import { IdentityService } from '../services/identityService.js';
import { ReportService } from '../services/reportService.js';
import { ConnectorService, EnclaveService } from '../services/adminService.js';
import type { ConnectorFetchers } from '../connectors/index.js';

export interface ApiDeps {
  enclaves: EnclaveService;
  connectors: ConnectorService;
  runner: JobRunner;
  ingestion: IngestionService;
  identities: IdentityService;
  reports: ReportService;
}

export function createDeps(overrides: Partial<ApiDeps> = {}, fetchers: Partial<ConnectorFetchers> = {}): ApiDeps {
  const runner = overrides.runner ?? new JobRunner({ fetchers });
  return {
    enclaves: overrides.enclaves ?? new EnclaveService(),
    connectors: overrides.connectors ?? new ConnectorService(undefined, undefined, undefined, fetchers),
    runner,
    ingestion: overrides.ingestion ?? new IngestionService(runner),
    identities: overrides.identities ?? new IdentityService(),
    reports: overrides.reports ?? new ReportService(),
  };
}
