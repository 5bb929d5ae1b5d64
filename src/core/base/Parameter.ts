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

import { Type } from './Type';
import { Value } from './Value';

/**
 * A formal parameter of a routine. Parameters dominate every statement of their routine.
 * @category core/base
 */
export class Parameter implements Value {
    private readonly index: number;
    private readonly name: string;
    private readonly type: Type;

    constructor(index: number, name: string, type: Type) {
        this.index = index;
        this.name = name;
        this.type = type;
    }

    public getIndex(): number {
        return this.index;
    }

    public getName(): string {
        return this.name;
    }

    public hasName(): boolean {
        return this.name.length > 0;
    }

    public getType(): Type {
        return this.type;
    }

    public getUses(): Value[] {
        return [];
    }

    public toString(): string {
        return this.hasName() ? '%' + this.name : '%<arg' + this.index + '>';
    }
}
