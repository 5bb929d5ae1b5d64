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

import { Local } from '../base/Local';
import { Cfg } from '../graph/Cfg';

export class RoutineBody {
    private locals: Set<Local>;
    private cfg: Cfg;

    constructor(locals: Set<Local>, cfg: Cfg) {
        this.cfg = cfg;
        this.locals = locals;
    }

    public getLocals(): Set<Local> {
        return this.locals;
    }

    public setLocals(locals: Set<Local>): void {
        this.locals = locals;
    }

    public addLocal(local: Local): void {
        this.locals.add(local);
    }

    /** Returns the first local named `name`; unnamed locals cannot be looked up. */
    public getLocal(name: string): Local | undefined {
        if (name.length === 0) {
            return undefined;
        }
        for (const local of this.locals) {
            if (local.getName() === name) {
                return local;
            }
        }
        return undefined;
    }

    public getCfg(): Cfg {
        return this.cfg;
    }

    public setCfg(cfg: Cfg): void {
        this.cfg = cfg;
    }
}
