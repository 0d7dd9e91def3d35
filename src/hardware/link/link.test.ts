import { checkLink } from './link';

describe('checkLink', () => {
  it('should report the link up', () => {
    expect(checkLink()).toEqual({ up: true });
  });
});
