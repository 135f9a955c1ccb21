/**
 * CHANGE: Централизованные ре-экспорты Node built-ins для shell-модулей
 * WHY: Один источник fs/path для загрузчиков конфигурации и деревьев
 *
 * Инвариант: экспортируем совместимые объекты/функции, избегая `export *` для модулей с `export =`.
 */
import * as fsNS from "node:fs";
import * as pathNS from "node:path";

// CHANGE: Ре-экспорт через константы вместо `export *`
// WHY: node:path (и часто node:fs) используют `export =`, что несовместимо с `export *`
// REF: TypeScript limitation for `export =`
export const fs = fsNS;
export const path = pathNS;
