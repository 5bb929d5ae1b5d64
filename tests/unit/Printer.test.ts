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
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { CompilationUnit } from '../../src/core/model/CompilationUnit';
import { MigrationAnalyzer } from '../../src/MigrationAnalyzer';
import { JsonPrinter } from '../../src/save/JsonPrinter';
import { PrinterBuilder } from '../../src/save/PrinterBuilder';
import { TextPrinter } from '../../src/save/TextPrinter';
import { buildIrreducible } from './fixtures';

const COUNT_UNIT = path.join(__dirname, '../fixtures/count.json');

const COUNT_TEXT = [
    '; unit demo',
    'declare void @work()',
    'declare void @migration.stackmap(i64, i32, ...)',
    '',
    'define i32 @count(i32 %n) {',
    'entry:',
    '  goto -> header',
    'header:',
    '  %i = phi i32 [i32 0, entry], [%next, body]',
    '  %done = ge %i, %n',
    '  if %done -> exit, body',
    'body:',
    '  call void @work()',
    '  call void @migration.stackmap(i64 0, i32 0, %i, %n)',
    '  %next = add %i, i32 1',
    '  goto -> header',
    'exit:',
    '  return %i',
    '}',
    '; loop paths',
    '; loop#0 at header (depth 1, 2 blocks)',
    ';   [header, body] header -> equivalence point',
    ';   [body] equivalence point -> backedge',
    '',
].join('\n');

function analyzeCount(): MigrationAnalyzer {
    const analyzer = new MigrationAnalyzer();
    analyzer.buildFromFile(COUNT_UNIT);
    analyzer.run();
    return analyzer;
}

describe('TextPrinter', () => {
    it('prints the instrumented unit followed by its loop paths', () => {
        const analyzer = analyzeCount();
        expect(new TextPrinter(analyzer.getUnit(), analyzer.getRoutineReports()).dump()).toBe(COUNT_TEXT);
    });

    it('prints the reason a loop path analysis failed', () => {
        const unit = new CompilationUnit();
        unit.addRoutine(buildIrreducible().routine);
        const analyzer = new MigrationAnalyzer();
        analyzer.buildFromUnit(unit);
        analyzer.analyzeLoopPaths();

        const lines = new TextPrinter(unit, analyzer.getRoutineReports()).dump().split('\n');
        expect(lines[0]).toBe('');
        expect(lines[1]).toBe('define void @irreducible(i1 %c) {');
        expect(lines[lines.length - 2]).toBe('; loop paths: detected a cycle in irreducible, bailing on analysis');
    });
});

describe('JsonPrinter', () => {
    it('serializes loop paths, summaries and stack maps', () => {
        const json = new JsonPrinter(analyzeCount()).serialize();
        expect(json.unit).toBe('demo');
        expect(json.modified).toBe(true);
        expect(json.diagnostics).toEqual([]);
        expect(json.stackMaps).toEqual([{ routine: 'count', id: 0, callSite: 'call void @work()', liveValues: ['%i', '%n'] }]);

        expect(json.routines).toHaveLength(1);
        const [routine] = json.routines;
        expect(routine.name).toBe('count');
        expect(routine.errCode).toBe(0);
        expect(routine.errMsg).toBeUndefined();
        expect(routine.loops).toEqual([{
            id: 0,
            header: 'header',
            depth: 1,
            parent: null,
            latches: ['body'],
            paths: [
                {
                    start: '%i = phi i32 [i32 0, entry], [%next, body]',
                    end: 'call void @work()',
                    startsAtHeader: true,
                    endsAtBackedge: false,
                    nodes: [{ block: 'header', subLoopExit: false }, { block: 'body', subLoopExit: false }],
                },
                {
                    start: '%next = add %i, i32 1',
                    end: 'goto',
                    startsAtHeader: false,
                    endsAtBackedge: true,
                    nodes: [{ block: 'body', subLoopExit: false }],
                },
            ],
            summary: {
                hasSpanningPath: { header: false, body: false },
                hasEqPointPath: { header: true, body: true },
            },
        }]);
    });

    it('dumps valid JSON', () => {
        const analyzer = analyzeCount();
        expect(JSON.parse(new JsonPrinter(analyzer).dump())).toEqual(new JsonPrinter(analyzer).serialize());
    });
});

describe('PrinterBuilder', () => {
    let tmpDir: string;

    beforeEach(() => {
        tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'printer-'));
    });

    afterEach(() => {
        fs.rmSync(tmpDir, { recursive: true, force: true });
    });

    it('writes text and json next to each other, named after the unit', async () => {
        const analyzer = analyzeCount();
        const builder = new PrinterBuilder(tmpDir);
        await builder.dumpToText(analyzer);
        await builder.dumpToJson(analyzer);

        expect(fs.readFileSync(path.join(tmpDir, 'demo.txt'), 'utf8')).toBe(COUNT_TEXT);
        expect(JSON.parse(fs.readFileSync(path.join(tmpDir, 'demo.json'), 'utf8')).unit).toBe('demo');
    });

    it('creates missing directories of an explicit output path', async () => {
        const output = path.join(tmpDir, 'nested', 'out.txt');
        await PrinterBuilder.dump(new TextPrinter(analyzeCount().getUnit()), output);
        expect(fs.readFileSync(output, 'utf8').startsWith('; unit demo\n')).toBe(true);
    });
});
