import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { ENV } from '../pipeline/env';
import { ConfigError, PipelineError } from '../pipeline/errors';
import { addSource, knownIds, lastAnalyzedAt, loadState, saveState } from '../pipeline/dedup';
import { createGeminiBackend } from '../pipeline/generate';
import { resolveLanguage } from '../pipeline/languages';
import { isLogLevel, setLogFile, setLogLevel } from '../pipeline/log';
import { createSourceConfig, runCheck } from '../pipeline/monitor';
import { ledgerFromEnv } from '../pipeline/run_db';
import { entityIds, loadStore } from '../pipeline/store';
import { createTranscriptProvider } from '../pipeline/transcript';
import { createYtdlpCatalog } from '../pipeline/ytdlp';
import type { SourceType } from '../pipeline/types';

function parseSourceType(value: string | undefined): SourceType | undefined {
    if (value === undefined || value === 'channel' || value === 'playlist') return value;
    throw new ConfigError(`Unknown source type: ${value}`);
}

async function main() {
    if (isLogLevel(ENV.logLevel)) setLogLevel(ENV.logLevel);
    if (ENV.logFile) setLogFile(ENV.logFile);

    await yargs(hideBin(process.argv))
        .scriptName('monitor')
        .option('state', { type: 'string', default: ENV.monitorStatePath, describe: 'Monitor state file' })
        .command(
            'add <sourceId>',
            'Watch a channel or playlist',
            (y) =>
                y
                    .positional('sourceId', { type: 'string', demandOption: true })
                    .option('name', { type: 'string' })
                    .option('limit', { type: 'number', describe: 'Items fetched per check for this source' })
                    .option('type', { type: 'string', choices: ['channel', 'playlist'] }),
            async (argv) => {
                const source = createSourceConfig(argv.sourceId, {
                    name: argv.name,
                    limit: argv.limit,
                    type: parseSourceType(argv.type),
                });
                const state = addSource(await loadState(argv.state), source);
                await saveState(argv.state, state);
                console.log(`Watching ${source.type} ${source.id} (${source.name})`);
            }
        )
        .command(
            'list',
            'Show watched sources',
            (y) => y.option('store', { type: 'string', default: ENV.videoJsonPath }),
            async (argv) => {
                const state = await loadState(argv.state);
                const store = await loadStore(argv.store);
                console.log(`Store ${store.path}: ${entityIds(store).length} videos`);
                const sources = Object.values(state.sources);
                if (!sources.length) {
                    console.log('No sources registered. Add one with: monitor add <sourceId> --name <name>');
                    return;
                }
                for (const s of sources) {
                    const last = lastAnalyzedAt(state, s.id) ?? 'never';
                    console.log(
                        `${s.id}\t${s.type}\t${s.name}\tknown=${knownIds(state, s.id).length}\tlimit=${s.limit ?? ENV.fetchLimit}\tlast=${last}`
                    );
                }
            }
        )
        .command(
            ['check', '$0'],
            'Analyse new uploads of the watched sources',
            (y) =>
                y
                    .option('source', { type: 'string', array: true, describe: 'Only check these source ids' })
                    .option('limit', {
                        type: 'number',
                        describe: `Items fetched per source; overrides the limit given to add (default ${ENV.fetchLimit})`,
                    })
                    .option('language', { type: 'string', default: ENV.defaultLanguage })
                    .option('api-key', { type: 'string' })
                    .option('store', { type: 'string', default: ENV.videoJsonPath }),
            async (argv) => {
                if (argv.limit !== undefined && (!Number.isInteger(argv.limit) || argv.limit < 1)) {
                    throw new ConfigError(`Invalid --limit: ${argv.limit}`);
                }
                const apiKey = argv['api-key'] || ENV.apiKey;
                if (!apiKey) {
                    throw new ConfigError('API_KEY is missing. Set it in the environment or pass --api-key.');
                }
                const backend = createGeminiBackend({
                    apiKey,
                    model: ENV.geminiModel,
                    structuredModel: ENV.geminiStructuredModel,
                });
                const state = await loadState(argv.state);
                const { stats } = await runCheck(
                    {
                        store: await loadStore(argv.store),
                        transcripts: createTranscriptProvider(),
                        catalog: createYtdlpCatalog(),
                        backend: () => backend,
                        statePath: argv.state,
                        ledger: ledgerFromEnv(),
                    },
                    state,
                    {
                        sourceIds: argv.source,
                        limit: argv.limit,
                        defaultLimit: ENV.fetchLimit,
                        language: resolveLanguage(argv.language),
                        knownCap: ENV.knownIdsCap,
                    }
                );

                console.log(`\n=== Check Summary ===`);
                if (!stats.length) console.log('No sources checked.');
                for (const s of stats) {
                    const status = s.catalogFailed ? 'catalog failed' : `processed=${s.processed} skipped=${s.skipped} failed=${s.failed} unparsed=${s.unparsed}`;
                    console.log(`${s.sourceId}: listed=${s.listed} ${status}`);
                }
            }
        )
        .strict()
        .help()
        .parseAsync();
}

main().catch((e) => {
    console.error(e instanceof PipelineError ? `error: ${e.message}` : e);
    process.exit(1);
});
