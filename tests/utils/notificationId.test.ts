/**
 * Notification id derivation tests
 */

import { notificationIdFor } from '../../src/utils/notificationId';

describe('notificationIdFor', () => {
  it('is stable for the same message id', () => {
    expect(notificationIdFor('msg-1')).toBe(1231102756);
    expect(notificationIdFor('msg-1')).toBe(notificationIdFor('msg-1'));
  });

  it('differs between message ids', () => {
    expect(notificationIdFor('a')).toBe(1678518572);
    expect(notificationIdFor('a')).not.toBe(notificationIdFor('msg-1'));
  });

  it('handles a missing message id', () => {
    expect(notificationIdFor(undefined)).toBe(18652613);
    expect(notificationIdFor('')).toBe(18652613);
  });
});
