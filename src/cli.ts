#!/usr/bin/env node
import dotenv from 'dotenv';
dotenv.config();

import { loadConfig } from './config';
import { runFromConfig } from './scrapers/runner';
import { listSources } from './scrapers/registry';
import { SnapshotStore } from './snapshot/store';
import { getJobStats } from './snapshot/query';

const args = process.argv.slice(2);
const force = args.includes('--force');
const [command, arg] = args.filter(a => a !== '--force');

async function main() {
  const config = loadConfig();

  switch (command) {
    case 'scrape': {
      const source = arg || 'all';
      const summary = await runFromConfig(config, { sources: source === 'all' ? undefined : [source], force });
      console.log('\nResults:', JSON.stringify(summary, null, 2));
      break;
    }

    case 'sources': {
      const enabled = config.enabledSources;
      for (const name of listSources()) {
        const off = enabled.length > 0 && !enabled.includes(name);
        console.log(off ? `${name} (disabled)` : name);
      }
      break;
    }

    case 'stats': {
      const jobs = await new SnapshotStore(config.snapshotPath).load();
      console.log('\nStats:', JSON.stringify(getJobStats(jobs), null, 2));
      break;
    }

    default:
      console.log(`
Usage:
  tsx src/cli.ts scrape [source|all] [--force]   Run the pipeline (--force saves even an empty result)
  tsx src/cli.ts sources                         List registered sources
  tsx src/cli.ts stats                           Show snapshot stats
      `);
  }
}

main().catch(err => {
  console.error('Error:', err);
  process.exit(1);
});
