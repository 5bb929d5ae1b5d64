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

// types
export const VOID_KEYWORD = 'void';
export const UNKNOWN_KEYWORD = 'unknown';
export const PTR_KEYWORD = 'ptr';
export const INT_PREFIX = 'i';
export const FLOAT_PREFIX = 'f';

// stack map marker
export const DEFAULT_STACKMAP_NAME = 'migration.stackmap';
export const STACKMAP_ID_BITS = 64;
export const STACKMAP_FLAGS_BITS = 32;

// loop paths
export const DEFAULT_MAX_NUM_PATHS = 10000;

export const UNNAMED_BLOCK = '<unnamed block>';
export const UNNAMED_STMT = '<unnamed instruction>';
