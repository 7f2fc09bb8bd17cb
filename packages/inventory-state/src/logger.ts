import type { InventoryLogger } from './types.js';

// stdout for output, stderr for warnings
export const consoleLogger: InventoryLogger = {
  info: (message) => console.log(message),
  warn: (message) => console.error(message),
};

export const silentLogger: InventoryLogger = {
  info: () => {},
  warn: () => {},
};
