/**
 * @recordsmith/shared
 * Constants, errors, value helpers and validators used by the record packages
 */

export * from './types';
export * from './constants';
export * from './config';
export * from './errors';
export * from './utils';
export * from './validators';
