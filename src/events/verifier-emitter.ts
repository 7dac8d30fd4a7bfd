import { EventEmitter } from 'eventemitter3';
import type { VerifierEvents } from '../types.js';

/**
 * Progress events for a verification run. Callers pass their own instance to
 * observe a run; one with no listeners is a no-op.
 */
export class VerifierEmitter extends EventEmitter<VerifierEvents> {}
