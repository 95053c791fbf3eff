export * from './@log/index.js';
export * from './@utils/index.js';
export * from './config.js';
export * from './ddns/index.js';
export * from './errors.js';
export * from './exit-code.js';
export * from './public-ip.js';
export * from './x.js';
