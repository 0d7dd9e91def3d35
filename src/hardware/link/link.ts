/**
 * Simulated communications link
 *
 * The link never drops on its own; communication loss only comes from the
 * comm_break fault.
 */

export interface LinkStatus {
  up: boolean;
}

/**
 * Check the link
 * @returns Link status
 */
export function checkLink(): LinkStatus {
  return { up: true };
}
