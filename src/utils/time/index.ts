export { now, sleep, formatTimestamp } from './time';
