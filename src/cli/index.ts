#!/usr/bin/env node
import fs from 'node:fs';
import { Command } from 'commander';
import { z } from 'zod';
import { resolveConfig, type ConfigOverrides } from '../utils/config.js';
import { initLogger, getLogger } from '../utils/logger.js';
import { getHttpClient } from '../utils/http-client.js';
import { EligibilityError, ScenarioError, describeError } from '../utils/errors.js';
import { SqliteEntityStore } from '../storage/database.js';
import { importCaseFixture, readCaseFixture } from '../storage/case-fixture.js';
import { DataCollector } from '../collector/data-collector.js';
import { ScenarioOrchestrator } from '../builder/scenario-orchestrator.js';
import { createNarrativeEnricher } from '../enrichment/factory.js';
import type { ScenarioSynthConfig } from '../types/index.js';

const VERSION = '0.1.0';

const EXIT_FAILURE = 1;
const EXIT_INELIGIBLE = 2;

/**
 * Flags shared by every command.
 */
const CommonOptionsSchema = z.object({
    db: z.string().optional(),
    logLevel: z.enum(['error', 'warn', 'info', 'debug', 'silent']).optional(),
    jsonLogs: z.boolean().optional(),
});

const ImportOptionsSchema = CommonOptionsSchema.extend({
    input: z.string().min(1),
});

const GenerateOptionsSchema = CommonOptionsSchema.extend({
    out: z.string().optional(),
    enrich: z.boolean().optional(),
    timeout: z.coerce.number().int().min(0).optional(),
});

type CommonOptions = z.infer<typeof CommonOptionsSchema>;

/**
 * Resolve config from flags and start the logger.
 */
async function setup(opts: CommonOptions, extra: ConfigOverrides = {}): Promise<ScenarioSynthConfig> {
    const config = await resolveConfig({
        db: opts.db,
        logLevel: opts.logLevel,
        jsonLogs: opts.jsonLogs,
        ...extra,
    });
    initLogger({ level: config.logLevel, jsonLogs: config.jsonLogs });
    return config;
}

function parseOptions<Output>(schema: z.ZodType<Output, z.ZodTypeDef, unknown>, raw: unknown): Output {
    const parsed = schema.safeParse(raw);
    if (!parsed.success) {
        const issues = parsed.error.issues.map((issue) => `--${issue.path.join('.')}: ${issue.message}`);
        console.error(`Invalid options: ${issues.join('; ')}`);
        process.exit(EXIT_FAILURE);
    }
    return parsed.data;
}

function addCommonOptions(command: Command): Command {
    return command
        .option('--db <path>', 'SQLite database path')
        .option('--log-level <level>', 'Log level: debug | info | warn | error | silent')
        .option('--json-logs', 'Output JSON logs');
}

const program = new Command();

program
    .name('scenario-synth')
    .description('Synthesize case timelines and participant profiles for interactive ethics scenarios.')
    .version(VERSION);

// ─── IMPORT command ───────────────────────────────────────

addCommonOptions(
    program
        .command('import')
        .description('Load a case fixture (JSON) into the database')
        .requiredOption('-i, --input <file>', 'Case fixture file')
).action(async (rawOpts: unknown) => {
    const opts = parseOptions(ImportOptionsSchema, rawOpts);
    const config = await setup(opts);
    const logger = getLogger();

    let store: SqliteEntityStore | null = null;
    try {
        const fixture = readCaseFixture(opts.input);
        store = new SqliteEntityStore(config.db);
        importCaseFixture(store, fixture);
        console.log(`Imported case ${fixture.caseId} into ${config.db}`);
    } catch (error) {
        logger.error({ error: describeError(error) }, 'Import failed');
        process.exitCode = EXIT_FAILURE;
    } finally {
        store?.close();
    }
});

// ─── CHECK command ────────────────────────────────────────

addCommonOptions(
    program
        .command('check')
        .description('Print the eligibility report for a case')
        .argument('<caseId>', 'Case identifier')
).action(async (caseId: string, rawOpts: unknown) => {
    const opts = parseOptions(CommonOptionsSchema, rawOpts);
    const config = await setup(opts);
    const logger = getLogger();

    let store: SqliteEntityStore | null = null;
    try {
        store = new SqliteEntityStore(config.db);
        const report = new DataCollector(store).checkEligibility(caseId);
        console.log(JSON.stringify(report, null, 2));
        if (!report.eligible) process.exitCode = EXIT_INELIGIBLE;
    } catch (error) {
        const message = error instanceof ScenarioError ? error.toSafeMessage() : describeError(error);
        logger.error({ caseId, error: describeError(error) }, 'Eligibility check failed');
        console.error(message);
        process.exitCode = EXIT_FAILURE;
    } finally {
        store?.close();
    }
});

// ─── GENERATE command ─────────────────────────────────────

addCommonOptions(
    program
        .command('generate')
        .description('Run the synthesis pipeline for a case and print the result as JSON')
        .argument('<caseId>', 'Case identifier')
        .option('-o, --out <file>', 'Write the result to a file instead of stdout')
        .option('--enrich', 'Enable LLM narrative enrichment')
        .option('--timeout <ms>', 'Whole-run timeout in milliseconds (0 = none)')
).action(async (caseId: string, rawOpts: unknown) => {
    const opts = parseOptions(GenerateOptionsSchema, rawOpts);
    const config = await setup(opts, {
        pipeline: opts.timeout !== undefined ? { timeoutMs: opts.timeout } : undefined,
        enrichment: opts.enrich ? { enabled: true } : undefined,
    });
    const logger = getLogger();
    const http = getHttpClient({ timeout: config.enrichment.timeoutMs, version: VERSION });

    let store: SqliteEntityStore | null = null;
    try {
        store = new SqliteEntityStore(config.db);
        const orchestrator = new ScenarioOrchestrator(store, {
            enricher: createNarrativeEnricher(config.enrichment),
            timeoutMs: config.pipeline.timeoutMs,
            enrichmentTimeoutMs: config.enrichment.timeoutMs,
        });

        const result = await orchestrator.generate(caseId, (event) => {
            logger.info({ stage: event.stage, percent: event.percent }, event.message);
        });

        logger.info(
            {
                caseId,
                durationMs: result.durationMs,
                enrichedProfiles: result.participants.participants.filter((p) => p.enriched).length,
                httpRequests: http.getAllRequestCounts(),
            },
            'Scenario core generated'
        );

        const json = JSON.stringify(result, null, 2);
        if (opts.out) {
            fs.writeFileSync(opts.out, json + '\n', 'utf-8');
            console.log(`Scenario core written to ${opts.out}`);
        } else {
            console.log(json);
        }
    } catch (error) {
        const message = error instanceof ScenarioError ? error.toSafeMessage() : describeError(error);
        console.error(message);
        process.exitCode = error instanceof EligibilityError ? EXIT_INELIGIBLE : EXIT_FAILURE;
    } finally {
        store?.close();
    }
});

program.parseAsync(process.argv).catch((error: unknown) => {
    console.error(describeError(error));
    process.exit(EXIT_FAILURE);
});
