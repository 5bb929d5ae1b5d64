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

import { Routine } from './Routine';
import { RoutineSignature } from './RoutineSignature';

/**
 * @category core/model
 */
export class CompilationUnit {
    private name: string;

    // name to model
    private routines: Map<string, Routine> = new Map<string, Routine>();
    private declarations: Map<string, RoutineSignature> = new Map<string, RoutineSignature>();

    constructor(name: string = '') {
        this.name = name;
    }

    public getName(): string {
        return this.name;
    }

    /**
     * Returns the routines with a body, in the order they were added.
     */
    public getRoutines(): Routine[] {
        return Array.from(this.routines.values());
    }

    public getRoutine(name: string): Routine | undefined {
        return this.routines.get(name);
    }

    public addRoutine(routine: Routine): void {
        if (this.routines.has(routine.getName())) {
            throw new Error(`Routine ${routine.getName()} is already defined in unit ${this.name}.`);
        }
        routine.setDeclaringUnit(this);
        this.routines.set(routine.getName(), routine);
        this.declarations.set(routine.getName(), routine.getSignature());
    }

    /**
     * Returns the signature of a routine or external declaration named `name`.
     */
    public getDeclaration(name: string): RoutineSignature | undefined {
        return this.declarations.get(name);
    }

    public getDeclarations(): RoutineSignature[] {
        return Array.from(this.declarations.values());
    }

    public addDeclaration(signature: RoutineSignature): void {
        this.declarations.set(signature.getName(), signature);
    }

    public toString(): string {
        return this.name;
    }
}
