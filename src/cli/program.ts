/**
 * Commands for the pricing agent CLI
 */

import { Command } from 'commander';
import ora from 'ora';
import chalk from 'chalk';
import { PricingProductSource, type ProductSource } from '../aws/client.js';
import { listRegions } from '../aws/regions.js';
import { runPricingQuery } from '../agent/pricing-agent.js';
import { listFriendlyFilters, parseFilterPairs } from '../filters/filter-normalizer.js';
import { DEFAULT_MAX_RECORDS } from '../config/index.js';
import { logger } from '../utils/logger.js';
import type { QueryResult } from '../types/pricing.js';

export interface QueryOptions {
    region?: string[];
    filter?: string[];
    maxRecords: string;
    output?: string;
    json?: boolean;
}

export interface CliDeps {
    /** Created on first query when absent */
    source?: ProductSource;
    print?: (line: string) => void;
    printError?: (line: string) => void;
}

/**
 * Run `query`. Failures are printed and set a non-zero exit code.
 */
export async function runQueryCommand(
    serviceCode: string,
    options: QueryOptions,
    deps: CliDeps = {}
): Promise<QueryResult | undefined> {
    const print = deps.print ?? console.log;
    const printError = deps.printError ?? console.error;
    const spinner = ora(`Querying ${serviceCode} pricing...`).start();

    try {
        const result = await runPricingQuery(
            {
                service_code: serviceCode,
                ...(options.region ? { regions: options.region } : {}),
                filters: parseFilterPairs(options.filter),
                max_records: Number(options.maxRecords),
                ...(options.output ? { result_file_path: options.output } : {}),
            },
            { source: deps.source ?? new PricingProductSource() }
        );

        spinner.succeed(`Fetched ${result.record_count} pricing records`);

        if (options.json) {
            print(JSON.stringify(result, null, 2));
            return result;
        }

        print(chalk.blue(`Service:  ${result.service_code}`));
        print(chalk.blue(`Regions:  ${result.regions_queried.join(', ')}`));
        print(chalk.blue(`Filters:  ${JSON.stringify(result.filters_applied)}`));
        print(chalk.green(`Records:  ${result.record_count}`));
        print(chalk.yellow(`Saved to: ${result.result_file_path}`));
        return result;
    } catch (error) {
        spinner.fail('Pricing query failed');
        logger.error({ err: error }, 'CLI error');
        printError(chalk.red(error instanceof Error ? error.message : String(error)));
        process.exitCode = 1;
        return undefined;
    }
}

export function createProgram(deps: CliDeps = {}): Command {
    const print = deps.print ?? console.log;
    const program = new Command();

    program
        .name('pricing-agent')
        .description('Query the AWS Price List API and save normalized pricing records')
        .version('1.0.0');

    program
        .command('query')
        .description('Query pricing for a service code (e.g. AmazonEC2)')
        .argument('<serviceCode>', 'AWS service code')
        .option('-r, --region <regions...>', 'Region codes to query, in order')
        .option('-f, --filter <filters...>', 'Filters as key=value, friendly names allowed')
        .option('-m, --max-records <number>', 'Maximum records across all regions', String(DEFAULT_MAX_RECORDS))
        .option('-o, --output <path>', 'Result file path')
        .option('--json', 'Print the full response as JSON')
        .action(async (serviceCode: string, options: QueryOptions) => {
            await runQueryCommand(serviceCode, options, deps);
        });

    program
        .command('filters')
        .description('List friendly filter names and the Price List fields they map to')
        .action(() => {
            print(chalk.bold('Friendly filter names:'));
            for (const { name, field } of listFriendlyFilters()) {
                print(`  ${chalk.cyan(name.padEnd(24))} -> ${field}`);
            }
        });

    program
        .command('regions')
        .description('List supported region codes')
        .action(() => {
            print(chalk.bold('Supported regions:'));
            for (const { region, location } of listRegions()) {
                print(`  ${chalk.cyan(region.padEnd(16))} ${location}`);
            }
        });

    return program;
}
