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

export enum AnalysisErrorCode {
    OK = 0,
    BB_MORE_THAN_ONE_TERMINATOR = -1,
    BB_TERMINATOR_NOT_AT_END = -2,
    BB_MISSING_TERMINATOR = -3,
    CFG_NOT_FOUND_START_BLOCK = -4,
    LOOP_PATHS_CYCLE_DETECTED = -5,
    LOOP_PATHS_TOO_MANY = -6,
}

export interface AnalysisError {
    errCode: AnalysisErrorCode;
    errMsg?: string;
}
