#!/usr/bin/env node

import { Command } from 'commander';
import { checkCommand } from './commands/check';
import { thresholdsCommand } from './commands/thresholds';
import { addThresholdOptions } from './threshold-options';

const program = new Command();

program
    .name('jtl-gate')
    .description('Validate JMeter JTL results against performance quality gates')
    .version('1.0.0');

addThresholdOptions(
    program
        .command('check')
        .description('Compute metrics from a JTL file and enforce the quality gates')
        .argument('<jtl-file>', 'Path to JMeter JTL result file (CSV)')
)
    .option('-d, --delimiter <char>', 'CSV delimiter used in the JTL file', ',')
    .option('-f, --format <format>', 'Report format (console|json)', 'console')
    .option('-o, --output <file>', 'Also write the report as JSON to this file')
    .option('-v, --verbose', 'Enable verbose logging')
    .action(checkCommand);

addThresholdOptions(
    program
        .command('thresholds')
        .description('Print the effective thresholds after config, environment and flag overrides')
)
    .action(thresholdsCommand);

program.parse();
