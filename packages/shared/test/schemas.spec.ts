import { describe, expect, it } from 'vitest';
import { actionRequestSchema, devCardFileSchema, exitMapSchema } from '../src';

const quiet = { kind: 'HEALTH', delta: 0, message: 'all quiet' };

describe('content schemas', () => {
  it('requires at least one open exit', () => {
    expect(exitMapSchema.safeParse({ N: false, E: false, S: false, W: false }).success).toBe(false);
    expect(exitMapSchema.safeParse({ N: false, E: true, S: false, W: false }).success).toBe(true);
  });

  it('points at the card and hour missing from the clock', () => {
    const parsed = devCardFileSchema.safeParse({
      clock: ['9 PM', '10 PM'],
      cards: [{ item: 'Machete', events: { '9 PM': quiet } }],
    });

    expect(parsed.success).toBe(false);
    if (!parsed.success) {
      expect(parsed.error.issues[0]).toMatchObject({
        path: ['cards', 0, 'events', '10 PM'],
        message: 'card "Machete" has no event for 10 PM',
      });
    }
  });
});

describe('actionRequestSchema', () => {
  it('accepts moves with scripted answers', () => {
    expect(actionRequestSchema.parse({ type: 'move', direction: ' n ', answers: ['W'] })).toEqual({
      type: 'move',
      direction: 'n',
      answers: ['W'],
    });
  });

  it('rejects unknown actions and blank directions', () => {
    expect(actionRequestSchema.safeParse({ type: 'fly' }).success).toBe(false);
    expect(actionRequestSchema.safeParse({ type: 'bash', direction: '   ' }).success).toBe(false);
  });
});
