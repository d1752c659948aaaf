import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { ENV } from '../pipeline/env';
import { PipelineError } from '../pipeline/errors';
import { summarizeVideo, type DigestDeps } from '../pipeline/digest';
import { createGeminiBackend } from '../pipeline/generate';
import { resolveLanguage, SUPPORTED_LANGUAGES } from '../pipeline/languages';
import { isLogLevel, setLogFile, setLogLevel } from '../pipeline/log';
import { loadStore } from '../pipeline/store';
import { drain } from '../pipeline/tee';
import { createTranscriptProvider } from '../pipeline/transcript';

async function main() {
    const argv = await yargs(hideBin(process.argv))
        .usage('$0 --video <url|id> [--language German] [--category summary|rating]')
        .option('video', { type: 'string', demandOption: true, describe: 'YouTube URL or video id' })
        .option('language', {
            type: 'string',
            default: ENV.defaultLanguage,
            describe: `Output language (${SUPPORTED_LANGUAGES.join(', ')} or an ISO code)`,
        })
        .option('category', { type: 'string', choices: ['summary', 'rating'], default: 'summary' })
        .option('prompt', { type: 'string', describe: 'Custom instructions; the result is not cached' })
        .option('api-key', { type: 'string', describe: 'Generation backend key (defaults to API_KEY)' })
        .option('store', { type: 'string', default: ENV.videoJsonPath })
        .option('show-transcript', { type: 'boolean', default: false })
        .option('lang', { type: 'string', describe: 'Caption track language code; the result is not cached' })
        .option('start', { type: 'number', describe: 'Window start in seconds; the result is not cached' })
        .option('end', { type: 'number', describe: 'Window end in seconds; the result is not cached' })
        .strict()
        .parse();

    if (isLogLevel(ENV.logLevel)) setLogLevel(ENV.logLevel);
    if (ENV.logFile) setLogFile(ENV.logFile);

    const apiKey = argv['api-key'] || ENV.apiKey;

    const deps: DigestDeps = {
        store: await loadStore(argv.store),
        transcripts: createTranscriptProvider(),
        backend: () =>
            createGeminiBackend({
                apiKey,
                model: ENV.geminiModel,
                structuredModel: ENV.geminiStructuredModel,
            }),
        replayDelayMs: ENV.replayDelayMs,
    };

    const result = await summarizeVideo(deps, {
        video: argv.video,
        language: resolveLanguage(argv.language),
        category: argv.category === 'rating' ? 'rating' : 'summary',
        instructions: argv.prompt,
        fetch: { lang: argv.lang, startSec: argv.start, endSec: argv.end },
    });

    if (result.category === 'rating') {
        console.log(JSON.stringify(result.rating.value, null, 2));
    } else {
        await drain(result.summary.fragments, (fragment) => process.stdout.write(fragment));
        process.stdout.write('\n');
    }

    if (argv['show-transcript']) {
        console.log('\n--- Transcript ---\n');
        console.log(result.transcript);
    }
}

main().catch((e) => {
    // Known failures get a one-line message; anything else keeps its stack
    console.error(e instanceof PipelineError ? `error: ${e.message}` : e);
    process.exit(1);
});
