#!/usr/bin/env node
import { readFileSync } from 'fs';
import chalk from 'chalk';
import { decodeAuthoredDocument, decodeTaxonomyDocument } from './documents.js';
import { formatStatement } from './graph/nquads.js';
import { buildGraph } from './pipeline.js';
import { candidateGraftsFor, candidateGraftsIn } from './query/grafting.js';
import { graftReport } from './report.js';
import { GraftException } from './types/errors.js';
import { DEFAULTS } from './types/options.js';

const VERSION = '0.1.0';
const HELP = `
field-graft v${VERSION}

Usage:
  field-graft statements [authored.json...]   Print the canonical statement set
  field-graft grafts <field.path> [authored.json...]
                                              Graft candidates for one field
  field-graft report [authored.json...]       Graft candidates for every authored field

Options:
  --taxonomy=<file.json>  Taxonomy document (repeatable, or comma separated).
                          Defaults to $${DEFAULTS.taxonomyEnvVar}.
  --type=<type>           With grafts: match this type instead of the field's own.
  --all                   With report: include fields without candidates
  --help, -h              Show this help
  --version, -v           Show version

Examples:
  field-graft grafts registry.path --taxonomy=taxonomy.json fields.json
  field-graft grafts foo.registry.path --type=keyword --taxonomy=taxonomy.json
`;

const args = process.argv.slice(2);

const taxonomyFiles: string[] = [];
let type: string | undefined;
const cleanArgs: string[] = [];

for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg.startsWith('--taxonomy=')) {
        taxonomyFiles.push(...splitList(arg.slice('--taxonomy='.length)));
    } else if (arg === '--taxonomy') {
        if (i + 1 < args.length) {
            taxonomyFiles.push(...splitList(args[i + 1]));
            i++;
        }
    } else if (arg.startsWith('--type=')) {
        type = arg.slice('--type='.length);
    } else if (arg === '--type') {
        if (i + 1 < args.length) {
            type = args[i + 1];
            i++;
        }
    } else if (!arg.startsWith('-')) {
        cleanArgs.push(arg);
    }
}

if (taxonomyFiles.length === 0) {
    taxonomyFiles.push(...splitList(process.env[DEFAULTS.taxonomyEnvVar] ?? ''));
}

const commandName = cleanArgs[0];

function main(): void {
    if (args.includes('--help') || args.includes('-h') || !commandName) {
        console.log(HELP);
        return;
    }

    if (args.includes('--version') || args.includes('-v')) {
        console.log(VERSION);
        return;
    }

    switch (commandName) {
        case 'statements': {
            const graph = loadGraph(cleanArgs.slice(1));
            for (const s of graph.allStatements()) {
                console.log(formatStatement(s));
            }
            break;
        }
        case 'grafts': {
            const field = cleanArgs[1];
            if (!field) {
                console.error('Error: field path required');
                process.exit(1);
            }
            const graph = loadGraph(cleanArgs.slice(2));
            const result = type === undefined
                ? candidateGraftsIn(graph, field)
                : candidateGraftsFor(graph, field, type);
            if (!result.success) {
                console.error(chalk.red(`✗ ${field}: ${result.error.message}`));
                process.exit(1);
            }
            if (result.candidates.length === 0) {
                console.log(chalk.yellow(`No graft candidates for ${field}`));
            }
            for (const candidate of result.candidates) {
                console.log(candidate);
            }
            break;
        }
        case 'report': {
            const graph = loadGraph(cleanArgs.slice(1));
            const entries = graftReport(graph, { includeEmpty: args.includes('--all') });
            for (const entry of entries) {
                if (entry.error) {
                    console.log(`${chalk.red('✗')} ${entry.path}: ${chalk.red(entry.error.message)}`);
                } else if (entry.candidates.length === 0) {
                    console.log(`${chalk.dim('-')} ${entry.path}`);
                } else {
                    console.log(`${chalk.green('✓')} ${entry.path} ${chalk.dim('->')} ${entry.candidates.join(', ')}`);
                }
            }
            break;
        }
        default:
            console.error(`Unknown command: ${commandName}`);
            console.log(HELP);
            process.exit(1);
    }
}

function loadGraph(authoredFiles: string[]) {
    if (taxonomyFiles.length === 0) {
        console.error(`Error: --taxonomy or ${DEFAULTS.taxonomyEnvVar} required`);
        process.exit(1);
    }
    return buildGraph({
        taxonomy: taxonomyFiles.map(f => decodeTaxonomyDocument(readFileSync(f, 'utf-8'), f)),
        authored: authoredFiles.map(f => decodeAuthoredDocument(readFileSync(f, 'utf-8'), f)),
    });
}

function splitList(value: string): string[] {
    return value.split(',').map(s => s.trim()).filter(s => s.length > 0);
}

try {
    main();
} catch (error) {
    if (error instanceof GraftException) {
        console.error(chalk.red(`Error: ${error.message}`));
        const issues = error.error.details?.issues;
        if (Array.isArray(issues)) {
            issues.forEach(issue => console.error(`  ${String(issue)}`));
        }
    } else {
        console.error('Unexpected error:', error);
    }
    process.exit(1);
}
