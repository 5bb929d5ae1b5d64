#!/usr/bin/env node
/*
 * Copyright (c) 2024 Huawei Device Co., Ltd.
 * Licensed under the Apache License, Version 2.0 (the "License");
 * you may not use this file except in compliance with the License.
 * You may obtain a copy of the License at
 *
 *     http://www.apache.org/licenses/LICENSE-2.0
 *
 * Unless required by applicable law or agreed to in writing, software
 * distributed under the License is distributed on an "AS IS" BASIS,
 * WITHOUT WARRANTIES OR CONDITIONS OF ANY KIND, either express or implied.
 * See the License for the specific language governing permissions and
 * limitations under the License.
 */

import path from 'path';
import fs from 'fs';
import { Command, InvalidArgumentError, Option } from 'commander';
import { AnalyzerConfig } from '../Config';
import { AnalysisErrorCode } from '../core/common/AnalysisError';
import { MigrationAnalyzer } from '../MigrationAnalyzer';
import Logger from '../utils/logger';
import { JsonPrinter } from './JsonPrinter';
import { Printer } from './Printer';
import { PrinterBuilder } from './PrinterBuilder';
import { TextPrinter } from './TextPrinter';

export interface AnalyzeOptions {
    maxPaths?: number;
    liveValues: boolean;
    format: 'text' | 'json';
    config?: string;
    verbose: boolean;
}

function parsePositiveInt(value: string): number {
    const parsed = Number(value);
    if (!Number.isInteger(parsed) || parsed <= 0) {
        throw new InvalidArgumentError('Not a positive integer.');
    }
    return parsed;
}

function getOutputPath(output: string, unitName: string, format: string): string {
    const filename = (unitName || path.parse(output).name) + (format === 'json' ? '.json' : '.txt');
    if (fs.existsSync(output) && fs.statSync(output).isDirectory()) {
        return path.join(output, filename);
    } else if (!fs.existsSync(output) && output.endsWith('/')) {
        return path.join(output, filename);
    }
    return output;
}

export async function analyzeUnitFile(input: string, output: string | undefined, options: AnalyzeOptions): Promise<void> {
    const verbose = options.verbose;
    if (verbose) console.log(`Analyzing unit: '${input}'`);

    const config = new AnalyzerConfig();
    if (options.config !== undefined && !config.buildFromJson(options.config)) {
        console.error(`ERROR: Cannot load the configuration '${options.config}'.`);
        process.exit(1);
    }
    config.mergeOptions({ maxNumPaths: options.maxPaths, noLiveValues: options.liveValues ? undefined : true });
    const logFile = config.getLogFile();
    if (logFile !== undefined) {
        Logger.configure(logFile, config.getLogLevel());
    } else {
        Logger.configureConsole(config.getLogLevel());
    }

    const analyzer = new MigrationAnalyzer(config);
    try {
        analyzer.buildFromFile(input);
    } catch (error) {
        console.error(`ERROR: ${error instanceof Error ? error.message : String(error)}`);
        process.exit(1);
    }

    if (verbose) console.log('Enumerating loop paths and inserting stack maps...');
    analyzer.run();
    if (verbose) {
        for (const report of analyzer.getRoutineReports()) {
            const status = report.result.errCode === AnalysisErrorCode.OK ? `${report.loops.length} loop(s)` : report.result.errMsg;
            console.log(`- '${report.routine.getName()}': ${status}`);
        }
        console.log(`Inserted ${analyzer.getStackMapRecords().length} stack map(s).`);
    }
    for (const diagnostic of analyzer.getDiagnostics()) {
        console.error(`WARNING: ${diagnostic.routine.getName()}: ${diagnostic.message}`);
    }

    const printer: Printer = options.format === 'json'
        ? new JsonPrinter(analyzer)
        : new TextPrinter(analyzer.getUnit(), analyzer.getRoutineReports());
    if (output === undefined) {
        process.stdout.write(printer.dump());
        return;
    }
    const outPath = getOutputPath(output, analyzer.getUnit().getName(), options.format);
    if (verbose) console.log(`Writing results to '${outPath}'...`);
    await PrinterBuilder.dump(printer, outPath);
    if (verbose) console.log('All done!');
}

export const program = new Command()
    .name('analyzeMigration')
    .description('Enumerate the loop paths of a unit and instrument its call sites with stack maps')
    .argument('<input>', 'Input unit (JSON)')
    .argument('[output]', 'Output file or directory, standard output when omitted')
    .option('--max-paths <n>', 'Maximum number of paths per loop', parsePositiveInt)
    .option('--no-live-values', 'Emit stack maps without live values')
    .addOption(new Option('-f, --format <format>', 'Output format').choices(['text', 'json']).default('text'))
    .option('-c, --config <file>', 'Configuration file')
    .option('-v, --verbose', 'Verbose output', false)
    .action(async (input: string, output: string | undefined, options: AnalyzeOptions) => {
        if (!fs.existsSync(input)) {
            console.error(`ERROR: The input path '${input}' does not exist.`);
            process.exit(1);
        }
        await analyzeUnitFile(input, output, options);
    });

if (require.main === module) {
    program.parseAsync(process.argv).catch((error: unknown) => {
        console.error(`ERROR: ${error instanceof Error ? error.message : String(error)}`);
        process.exit(1);
    });
}
