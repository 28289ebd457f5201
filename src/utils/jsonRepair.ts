// Utility wrapper for jsonrepair
import { jsonrepair } from 'jsonrepair';
import { createLogger, NAMESPACES } from '../logging.js';

const repairLog = createLogger(NAMESPACES.agents.base);

export default function tryJsonRepair(input: string): string | null {
  try {
    return jsonrepair(input);
  } catch (e) {
    repairLog('jsonrepair gave up: %s', e instanceof Error ? e.message : String(e));
    return null;
  }
}
