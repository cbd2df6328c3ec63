export { probeTarget, assertReachable, verifyKeyLogin } from './connectivity.js';
