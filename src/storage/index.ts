/**
 * Storage Layer
 *
 * File helpers shared by the table writers and the lookup corpus.
 * All write operations use atomic temp file + rename pattern.
 *
 * @module storage
 */

export { atomicWriteFile, atomicWriteJson, readJson, fileExists, isErrnoException } from './atomic.js';
