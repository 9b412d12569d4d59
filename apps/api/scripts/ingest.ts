import 'dotenv/config';
import { readdir, readFile, stat } from 'fs/promises';
import path from 'path';
import { loadPipelineConfig } from '../src/application/config/pipelineConfig';
import { IngestDocuments } from '../src/application/useCases/IngestDocuments';
import { Core } from '../src/infrastructure/Core';
import logger from '../src/infrastructure/logger';

/**
 * Builds the vector store from Page records produced by the PDF parser.
 *
 *   npm run ingest -- data/pages [more files or directories...]
 *
 * Accepts .json files (one page or an array of pages) and .jsonl files
 * (one page per line). STORE_DIR and the other settings come from the
 * environment.
 */
async function collectFiles(target: string): Promise<string[]> {
    const info = await stat(target);
    if (!info.isDirectory()) {
        return [target];
    }
    const entries = await readdir(target);
    const nested = await Promise.all(entries.sort().map(entry => collectFiles(path.join(target, entry))));
    return nested.flat().filter(file => /\.jsonl?$/i.test(file));
}

async function readRecords(file: string): Promise<unknown[]> {
    const text = await readFile(file, 'utf-8');
    if (file.toLowerCase().endsWith('.jsonl')) {
        return text
            .split('\n')
            .filter(line => line.trim().length > 0)
            .map((line): unknown => JSON.parse(line));
    }
    const parsed: unknown = JSON.parse(text);
    return Array.isArray(parsed) ? parsed : [parsed];
}

async function main() {
    const targets = process.argv.slice(2);
    if (targets.length === 0) {
        console.error('Usage: npm run ingest -- <pages.json|pages.jsonl|directory> [...]');
        process.exitCode = 1;
        return;
    }

    const config = loadPipelineConfig();
    const files = (await Promise.all(targets.map(collectFiles))).flat();
    logger.info('Reading page files', { files: files.length });

    const records: unknown[] = [];
    for (const file of files) {
        records.push(...await readRecords(file));
    }

    const core = new Core(config);
    const report = await core.getUseCase(IngestDocuments).execute(records);

    console.log(`Indexed ${report.chunkStats.totalChunks} chunks from ${report.pagesIndexed} pages`);
    console.log(`Skipped pages: ${report.pagesSkipped}`);
    console.log(`Regions: ${JSON.stringify(report.metadata.regions)}`);
    console.log(`Categories: ${JSON.stringify(report.metadata.categories)}`);
    console.log(`Store written to ${report.storeDirectory} (dimension ${report.dimension})`);
}

main().catch((error) => {
    logger.error('Ingestion failed; no store was published', { error });
    process.exitCode = 1;
});
