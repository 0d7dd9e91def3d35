export { checkLink } from './link';
export type { LinkStatus } from './link';
