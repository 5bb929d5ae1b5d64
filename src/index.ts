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

// core/base
export * from './core/base/Constant';
export * from './core/base/Expr';
export { Local } from './core/base/Local';
export { Parameter } from './core/base/Parameter';
export * from './core/base/Stmt';
export * from './core/base/Type';
export type { Value, ValueFormatter } from './core/base/Value';
export { DEFAULT_VALUE_FORMATTER } from './core/base/Value';

// core/common
export * from './core/common/AnalysisError';
export * from './core/common/Const';
export * from './core/common/EquivalencePoint';
export { SlotTracker, getValueName } from './core/common/SlotTracker';

// core/dataflow
export * from './core/dataflow/LiveValues';

// core/graph
export { BasicBlock } from './core/graph/BasicBlock';
export { Cfg } from './core/graph/Cfg';
export * from './core/graph/DominanceFinder';
export { Loop } from './core/graph/Loop';
export { LoopInfo } from './core/graph/LoopInfo';
export { LoopPath, PathNode } from './core/graph/LoopPath';
export * from './core/graph/LoopPathFinder';

// core/model
export { CompilationUnit } from './core/model/CompilationUnit';
export { Routine } from './core/model/Routine';
export { RoutineBody } from './core/model/RoutineBody';
export { RoutineSignature } from './core/model/RoutineSignature';
export * from './core/model/builder/RoutineBuilder';
export * from './core/model/builder/UnitJsonLoader';
export * from './core/model/builder/UnitSchema';

export * from './Config';
export * from './MigrationAnalyzer';

// save
export { Printer } from './save/Printer';
export { PrinterBuilder } from './save/PrinterBuilder';
export * from './save/JsonPrinter';
export { TextPrinter } from './save/TextPrinter';

// transformer
export * from './transformer/StackMapInserter';

// utils
export { default as Logger, LOG_LEVEL, LOG_MODULE_TYPE } from './utils/logger';
