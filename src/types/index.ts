/**
 * Type definitions for tubefetch
 */

export * from './config';
export * from './download';
