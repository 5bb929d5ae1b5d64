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

import { AnalyzerConfig } from './Config';
import { AnalysisError, AnalysisErrorCode } from './core/common/AnalysisError';
import { CallSiteClassifier } from './core/common/EquivalencePoint';
import { Loop } from './core/graph/Loop';
import { LoopInfo } from './core/graph/LoopInfo';
import { LoopPath } from './core/graph/LoopPath';
import { LoopPathFinder, LoopSummary } from './core/graph/LoopPathFinder';
import { CompilationUnit } from './core/model/CompilationUnit';
import { Routine } from './core/model/Routine';
import { UnitJsonLoader } from './core/model/builder/UnitJsonLoader';
import { StackMapDiagnostic, StackMapInserter, StackMapRecord } from './transformer/StackMapInserter';
import Logger, { LOG_MODULE_TYPE } from './utils/logger';

const logger = Logger.getLogger(LOG_MODULE_TYPE.MIGRATION_ANALYZER, 'MigrationAnalyzer');

export interface LoopReport {
    loop: Loop;
    paths: LoopPath[];
    summary: LoopSummary;
}

/**
 * Loop paths of one routine. `loops` is empty when the analysis of the routine aborted.
 */
export interface RoutineReport {
    routine: Routine;
    loopInfo: LoopInfo;
    result: AnalysisError;
    loops: LoopReport[];
}

/**
 * The MigrationAnalyzer holds a compilation unit and the results of both analyses on it:
 * the loop paths of every routine, and the stack maps inserted at its call sites.
 * @example
 * 1. analyze a unit described in JSON.

```typescript
const analyzer = new MigrationAnalyzer(new AnalyzerConfig());
analyzer.buildFromFile('unit.json');
analyzer.run();
for (const report of analyzer.getRoutineReports()) {
    ...
}
```
 */
export class MigrationAnalyzer {
    private config: AnalyzerConfig;
    private unit?: CompilationUnit;
    private routineReports: RoutineReport[] = [];
    private inserter: StackMapInserter;
    private modified: boolean = false;

    constructor(config: AnalyzerConfig = new AnalyzerConfig()) {
        this.config = config;
        this.inserter = new StackMapInserter({ markerName: config.getMarkerName(), noLiveValues: config.isNoLiveValues() });
    }

    public getConfig(): AnalyzerConfig {
        return this.config;
    }

    public buildFromFile(filePath: string): void {
        this.buildFromUnit(new UnitJsonLoader().loadFile(filePath));
    }

    public buildFromUnit(unit: CompilationUnit): void {
        this.unit = unit;
        this.routineReports = [];
        this.modified = false;
    }

    public getUnit(): CompilationUnit {
        if (!this.unit) {
            throw new Error('No unit has been loaded.');
        }
        return this.unit;
    }

    /** Runs the loop path analysis, then instruments the call sites. */
    public run(): void {
        this.analyzeLoopPaths();
        this.insertStackMaps();
    }

    public analyzeLoopPaths(): RoutineReport[] {
        const unit = this.getUnit();
        const finder = new LoopPathFinder({
            maxNumPaths: this.config.getMaxNumPaths(),
            classifier: new CallSiteClassifier(this.config.getMarkerName()),
        });

        this.routineReports = [];
        for (const routine of unit.getRoutines()) {
            const cfg = routine.getCfg();
            if (!cfg) {
                continue;
            }
            const loopInfo = new LoopInfo(cfg);
            const result = finder.runOnRoutine(routine, loopInfo);
            const loops: LoopReport[] = [];
            if (result.errCode === AnalysisErrorCode.OK) {
                for (const loop of loopInfo.getLoops()) {
                    loops.push({ loop: loop, paths: finder.getPaths(loop), summary: finder.getSummary(loop) });
                }
            }
            logger.info(`routine ${routine.getName()}: ${loopInfo.getLoops().length} loop(s), ${
                loops.reduce((total, report) => total + report.paths.length, 0)} path(s)`);
            this.routineReports.push({ routine: routine, loopInfo: loopInfo, result: result, loops: loops });
        }
        return this.routineReports;
    }

    /**
     * Routines whose loop path analysis failed keep no markers.
     * @returns true if the unit was modified.
     */
    public insertStackMaps(): boolean {
        const failed = new Set<Routine>();
        for (const report of this.routineReports) {
            if (report.result.errCode !== AnalysisErrorCode.OK) {
                failed.add(report.routine);
            }
        }
        this.modified = this.inserter.runOnUnit(this.getUnit(), failed);
        return this.modified;
    }

    public getRoutineReports(): RoutineReport[] {
        return this.routineReports;
    }

    public getRoutineReport(name: string): RoutineReport | undefined {
        return this.routineReports.find(report => report.routine.getName() === name);
    }

    public getStackMapRecords(): StackMapRecord[] {
        return this.inserter.getRecords();
    }

    public getDiagnostics(): StackMapDiagnostic[] {
        return this.inserter.getDiagnostics();
    }

    public isModified(): boolean {
        return this.modified;
    }
}
