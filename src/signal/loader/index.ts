/**
 * Signal Loader Module
 *
 * Supported inputs:
 * - Delimited text with time, volume and flow columns
 * - Raw device exports with `ltr/s` / `ltr` marker blocks
 * - Reference volume/flow loops
 *
 * @module signal/loader
 */

export * from './csv';
export * from './raw-export';
export * from './reference-loop';
