export { install } from './install.js';
export { update } from './update.js';
export { uninstall } from './uninstall.js';
