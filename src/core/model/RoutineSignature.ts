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

import { Type } from '../base/Type';

/**
 * The callable signature of a routine or an external declaration. Signatures are compared
 * by identity: the unit hands out one instance per name.
 * @category core/model
 */
export class RoutineSignature {
    private readonly name: string;
    private readonly parameterTypes: Type[];
    private readonly returnType: Type;
    private readonly variadic: boolean;

    constructor(name: string, parameterTypes: Type[], returnType: Type, variadic: boolean = false) {
        this.name = name;
        this.parameterTypes = parameterTypes;
        this.returnType = returnType;
        this.variadic = variadic;
    }

    public getName(): string {
        return this.name;
    }

    public getParameterTypes(): Type[] {
        return this.parameterTypes;
    }

    public getReturnType(): Type {
        return this.returnType;
    }

    public isVariadic(): boolean {
        return this.variadic;
    }

    public toString(): string {
        const params = this.parameterTypes.map(type => type.toString());
        if (this.variadic) {
            params.push('...');
        }
        return `${this.returnType.toString()} @${this.name}(${params.join(', ')})`;
    }
}
