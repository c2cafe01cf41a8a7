/**
 * @module application/config
 */

export { ConfigKeys, loadEligibilityConfig } from './config';

export type { EligibilityConfig } from './config';
