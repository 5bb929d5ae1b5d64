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

import fs from 'fs';
import { dirname, join } from 'path';
import type { MigrationAnalyzer } from '../MigrationAnalyzer';
import { JsonPrinter } from './JsonPrinter';
import { Printer } from './Printer';
import { TextPrinter } from './TextPrinter';

/**
 * @example
 * // dump the instrumented unit and its loop paths as text
 * let printer = new PrinterBuilder('output');
 * await printer.dumpToText(analyzer);
 *
 * // dump the analysis results as json
 * await PrinterBuilder.dump(new JsonPrinter(analyzer), 'output/unit.json');
 *
 * @category save
 */
export class PrinterBuilder {
    outputDir: string;
    constructor(outputDir: string = '') {
        this.outputDir = outputDir;
    }

    public static async dump(source: Printer, output: string): Promise<void> {
        fs.mkdirSync(dirname(output), { recursive: true });
        await fs.promises.writeFile(output, source.dump(), 'utf-8');
    }

    protected getOutputPath(analyzer: MigrationAnalyzer, extension: string): string {
        const name = analyzer.getUnit().getName() || 'unit';
        return join(this.outputDir === '' ? 'output' : this.outputDir, name + extension);
    }

    public dumpToText(analyzer: MigrationAnalyzer, output: string | undefined = undefined): Promise<void> {
        const filename = output ?? this.getOutputPath(analyzer, '.txt');
        const printer: Printer = new TextPrinter(analyzer.getUnit(), analyzer.getRoutineReports());
        return PrinterBuilder.dump(printer, filename);
    }

    public dumpToJson(analyzer: MigrationAnalyzer, output: string | undefined = undefined): Promise<void> {
        const filename = output ?? this.getOutputPath(analyzer, '.json');
        const printer: Printer = new JsonPrinter(analyzer);
        return PrinterBuilder.dump(printer, filename);
    }
}
