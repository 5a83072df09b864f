import { describe, it, expect, beforeEach, vi } from 'vitest';
import { inquirerPrompter } from '../../cli/src/prompts.js';

const mocks = vi.hoisted(() => ({
  close: vi.fn(),
  next: new Promise<{ answer: boolean }>(() => undefined),
}));

vi.mock('inquirer', () => ({
  default: {
    prompt: () => Object.assign(mocks.next, { ui: { close: mocks.close } }),
  },
}));

describe('inquirerPrompter.confirmUntil', () => {
  beforeEach(() => {
    mocks.close.mockReset();
    mocks.next = new Promise<{ answer: boolean }>(() => undefined);
  });

  it('should return the answer given before the deadline', async () => {
    mocks.next = Promise.resolve({ answer: true });

    await expect(inquirerPrompter.confirmUntil('Keep?', new Promise(() => undefined))).resolves.toBe(true);
    expect(mocks.close).not.toHaveBeenCalled();
  });

  it('should close the question when the deadline passes', async () => {
    await expect(inquirerPrompter.confirmUntil('Keep?', Promise.resolve('reverted'))).resolves.toBeUndefined();
    expect(mocks.close).toHaveBeenCalledTimes(1);
  });

  it('should close the question when the deadline fails', async () => {
    const deadline = Promise.reject(new Error('revert failed'));

    await expect(inquirerPrompter.confirmUntil('Keep?', deadline)).rejects.toThrow('revert failed');
    expect(mocks.close).toHaveBeenCalledTimes(1);
  });
});
