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
import path from 'path';
import { z } from 'zod';
import { DEFAULT_MAX_NUM_PATHS, DEFAULT_STACKMAP_NAME } from './core/common/Const';
import Logger, { LOG_LEVEL, LOG_MODULE_TYPE } from './utils/logger';

const logger = Logger.getLogger(LOG_MODULE_TYPE.MIGRATION_ANALYZER, 'Config');

export const AnalyzerOptionsSchema = z.object({
    maxNumPaths: z.number().int().positive().optional(),
    noLiveValues: z.boolean().optional(),
    markerName: z.string().min(1).optional(),
    logLevel: z.nativeEnum(LOG_LEVEL).optional(),
    logFile: z.string().min(1).optional(),
});

export type AnalyzerOptions = z.infer<typeof AnalyzerOptionsSchema>;

const CONFIG_FILENAME = 'analyzer.json';
const DEFAULT_CONFIG_FILE = path.join(__dirname, '../config', CONFIG_FILENAME);

/**
 * Options of a {@link MigrationAnalyzer} run. Defaults come from `config/analyzer.json`;
 * options given to the constructor and files loaded with {@link buildFromJson} override them.
 * @example
 * 1. raise the path ceiling of the default configuration.

```typescript
const config = new AnalyzerConfig({ maxNumPaths: 50000 });
config.buildFromJson('analyzer.local.json');
```
 */
export class AnalyzerConfig {
    private options: AnalyzerOptions;

    constructor(options?: AnalyzerOptions) {
        this.options = AnalyzerConfig.readOptions(DEFAULT_CONFIG_FILE) ?? {};
        if (options) {
            this.mergeOptions(options);
        }
    }

    public getOptions(): AnalyzerOptions {
        return this.options;
    }

    /**
     * Merges the options of a JSON file into the current ones.
     * @returns false if the file is missing or invalid, in which case nothing changes.
     */
    public buildFromJson(configJsonPath: string): boolean {
        if (!fs.existsSync(configJsonPath)) {
            logger.error(`Your configJsonPath: "${configJsonPath}" is not exist.`);
            return false;
        }
        const options = AnalyzerConfig.readOptions(configJsonPath);
        if (options === undefined) {
            return false;
        }
        this.mergeOptions(options);
        return true;
    }

    /** Options whose value is undefined keep the current value. */
    public mergeOptions(options: AnalyzerOptions): void {
        this.options = {
            maxNumPaths: options.maxNumPaths ?? this.options.maxNumPaths,
            noLiveValues: options.noLiveValues ?? this.options.noLiveValues,
            markerName: options.markerName ?? this.options.markerName,
            logLevel: options.logLevel ?? this.options.logLevel,
            logFile: options.logFile ?? this.options.logFile,
        };
    }

    public getMaxNumPaths(): number {
        return this.options.maxNumPaths ?? DEFAULT_MAX_NUM_PATHS;
    }

    public isNoLiveValues(): boolean {
        return this.options.noLiveValues ?? false;
    }

    public getMarkerName(): string {
        return this.options.markerName ?? DEFAULT_STACKMAP_NAME;
    }

    public getLogLevel(): LOG_LEVEL {
        return this.options.logLevel ?? LOG_LEVEL.ERROR;
    }

    public getLogFile(): string | undefined {
        return this.options.logFile;
    }

    private static readOptions(configJsonPath: string): AnalyzerOptions | undefined {
        let configurationsText: string;
        try {
            configurationsText = fs.readFileSync(configJsonPath, 'utf-8');
        } catch (error) {
            logger.error(`Error reading file: ${error}`);
            return undefined;
        }

        let configurations: unknown;
        try {
            configurations = JSON.parse(configurationsText);
        } catch (error) {
            logger.error(`Error parsing JSON: ${error}`);
            return undefined;
        }

        const parsed = AnalyzerOptionsSchema.safeParse(configurations);
        if (!parsed.success) {
            logger.error(`Invalid options in ${configJsonPath}: ${parsed.error.issues.map(issue => issue.message).join('; ')}`);
            return undefined;
        }
        return parsed.data;
    }
}
