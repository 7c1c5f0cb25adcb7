export const DEBUG_MOTOR = process.env.DEBUG_MOTOR === '1' || process.env.DEBUG_MOTOR === 'true';
export const DEBUG_MOTOR_LEVEL = Number.parseInt(process.env.DEBUG_MOTOR_LEVEL || (DEBUG_MOTOR ? '1' : '0'), 10) || 0;
export function dbg(...args: unknown[]) {
  if (DEBUG_MOTOR_LEVEL >= 1) console.log('[motor]', ...args);
}
export function dbgV(...args: unknown[]) {
  if (DEBUG_MOTOR_LEVEL >= 2) console.log('[motor]', ...args);
}
// Always printed: dropped frames, stray responses, failing callbacks
export function warn(...args: unknown[]) {
  console.warn('[motor]', ...args);
}
