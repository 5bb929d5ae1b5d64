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

import { Parameter } from '../base/Parameter';
import { Cfg } from '../graph/Cfg';
import { RoutineBody } from './RoutineBody';
import { RoutineSignature } from './RoutineSignature';
import type { CompilationUnit } from './CompilationUnit';

/**
 * A routine with a body. Routines without a body are plain {@link RoutineSignature}
 * declarations of their unit.
 * @category core/model
 */
export class Routine {
    private signature: RoutineSignature;
    private parameters: Parameter[];
    private body?: RoutineBody;
    private declaringUnit?: CompilationUnit;

    constructor(signature: RoutineSignature, parameters: Parameter[] = []) {
        this.signature = signature;
        this.parameters = parameters;
    }

    public getName(): string {
        return this.signature.getName();
    }

    public getSignature(): RoutineSignature {
        return this.signature;
    }

    public getParameters(): Parameter[] {
        return this.parameters;
    }

    public getBody(): RoutineBody | undefined {
        return this.body;
    }

    public setBody(body: RoutineBody): void {
        this.body = body;
    }

    /**
     * Get the CFG of the routine, or **undefined** for a routine whose body has not been built.
     */
    public getCfg(): Cfg | undefined {
        return this.body?.getCfg();
    }

    public getDeclaringUnit(): CompilationUnit | undefined {
        return this.declaringUnit;
    }

    public setDeclaringUnit(unit: CompilationUnit): void {
        this.declaringUnit = unit;
    }

    public toString(): string {
        return this.signature.toString();
    }
}
