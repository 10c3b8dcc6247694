import process from 'node:process';
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { PaginationFetch, resolveStartUrl } from './steps/scraper';

type StepAction = (context: PipelineContext) => Promise<void> | void;

export interface Step {
  name: string;
  description?: string;
  action: StepAction;
}

export interface PipelineContext {
  scenario: string;
  dryRun: boolean;
  startUrl: string;
  paginationFetch: PaginationFetch;
  top: number;
}

interface ScenarioDefinition {
  description: string;
  steps: Step[];
}

export async function runPipeline(context: PipelineContext, steps: Step[]): Promise<void> {
  console.info(`Starting pipeline scenario: ${context.scenario}`);
  if (context.dryRun) {
    console.info('Dry-run enabled. Steps will be logged but not executed.');
  }

  for (const step of steps) {
    console.info(`→ Step: ${step.name}`);
    if (step.description) {
      console.info(`   ${step.description}`);
    }

    if (context.dryRun) {
      console.info('   Skipped (dry-run)');
      continue;
    }

    await Promise.resolve(step.action(context));
    console.info('   Completed');
  }

  console.info(`Pipeline scenario "${context.scenario}" finished.`);
}

const stepCatalog: Record<string, Step> = {
  cleanOutputs: {
    name: 'Clean outputs',
    description: 'Remove scraped data, processed data and reports.',
    action: async () => {
      const module = await import('./steps/00_clean_outputs');
      module.cleanOutputs();
    },
  },
  scrapeTeams: {
    name: 'Scrape team stats',
    description: 'Walk every listing page and write the raw CSV.',
    action: async (context) => {
      const module = await import('./steps/01_scrape_teams');
      const outcome = await module.scrapeTeams({
        startUrl: context.startUrl,
        paginationFetch: context.paginationFetch,
      });
      if (outcome.status === 'aborted') {
        throw new Error(outcome.message ?? 'Scrape aborted');
      }
    },
  },
  processData: {
    name: 'Process data',
    description: 'Clean the raw CSV and write the profiling report.',
    action: async () => {
      const module = await import('./steps/02_process_data');
      await module.processData();
    },
  },
  analyzeStats: {
    name: 'Analyze stats',
    description: 'Print structure, object-field statistics and team rankings.',
    action: async (context) => {
      const module = await import('./steps/03_analyze_stats');
      await module.analyzeStats({ top: context.top });
    },
  },
};

const SCENARIOS: Record<string, ScenarioDefinition> = {
  'clean:outputs': {
    description: 'Delete generated data and reports.',
    steps: [stepCatalog.cleanOutputs],
  },
  'scrape:teams': {
    description: 'Scrape every page into data/raw (default).',
    steps: [stepCatalog.scrapeTeams],
  },
  'process:data': {
    description: 'Clean the raw CSV and build the profiling report.',
    steps: [stepCatalog.processData],
  },
  'analyze:stats': {
    description: 'Print EDA tables for the processed CSV.',
    steps: [stepCatalog.analyzeStats],
  },
  'build:dataset': {
    description: 'Scrape, then clean and profile.',
    steps: [stepCatalog.scrapeTeams, stepCatalog.processData],
  },
  'refresh:full': {
    description: 'Full refresh: clean, scrape, process, analyze.',
    steps: [
      stepCatalog.cleanOutputs,
      stepCatalog.scrapeTeams,
      stepCatalog.processData,
      stepCatalog.analyzeStats,
    ],
  },
};

function printAvailableScenarios(): void {
  console.info('Available scenarios:');
  Object.entries(SCENARIOS).forEach(([name, definition]) => {
    console.info(`  • ${name.padEnd(22)} ${definition.description}`);
  });
}

async function main(): Promise<void> {
  const parsed = yargs(hideBin(process.argv))
    .option('scenario', {
      alias: 's',
      type: 'string',
      describe: 'Pipeline scenario to run',
      default: process.env.PIPELINE_SCENARIO ?? 'scrape:teams',
    })
    .option('dry-run', {
      alias: 'd',
      type: 'boolean',
      describe: 'Log steps without executing',
      default: process.env.PIPELINE_DRY_RUN === '1',
    })
    .option('start-url', {
      type: 'string',
      describe: 'First listing page to scrape',
      default: resolveStartUrl(),
    })
    .option('refetch-pagination', {
      type: 'boolean',
      describe: 'Request each page a second time to find its "Next" link',
      default: false,
    })
    .option('top', {
      alias: 'n',
      type: 'number',
      describe: 'Number of teams in ranking tables',
      default: 5,
    })
    .option('list-scenarios', {
      alias: 'l',
      type: 'boolean',
      describe: 'List available scenarios and exit',
      default: false,
    })
    .help()
    .parseSync();

  if (parsed['list-scenarios']) {
    printAvailableScenarios();
    return;
  }

  const scenario = parsed.scenario;
  const scenarioDefinition = SCENARIOS[scenario];

  if (!scenarioDefinition) {
    console.error(`Unknown scenario "${scenario}".`);
    printAvailableScenarios();
    process.exitCode = 1;
    return;
  }

  const context: PipelineContext = {
    scenario,
    dryRun: Boolean(parsed['dry-run']),
    startUrl: parsed['start-url'],
    paginationFetch: parsed['refetch-pagination'] ? 'refetch' : 'reuse',
    top: Number.isFinite(parsed.top) ? parsed.top : 5,
  };

  await runPipeline(context, scenarioDefinition.steps);
}

if (require.main === module) {
  main().catch((error) => {
    console.error(error);
    process.exitCode = 1;
  });
}
