import { describe, it, expect, vi, beforeEach } from 'vitest';
import { InquirerHunkDecider, InquirerPrompter, cancellable, nonInteractivePrompter } from './prompts.js';
import { UserCancelledError } from './errors.js';
import type { HunkRequest } from './sync/types.js';

const { prompt } = vi.hoisted(() => ({ prompt: vi.fn() }));

vi.mock('inquirer', () => ({
  default: { prompt },
}));

function request(overrides: Partial<HunkRequest> = {}): HunkRequest {
  return {
    src: 'kitty/kitty.conf',
    index: 1,
    total: 1,
    hunk: {
      oldStart: 0,
      oldLines: ['font_size 12\n'],
      newStart: 0,
      newLines: ['font_size 14\n'],
      contextBefore: [],
      contextAfter: [],
    },
    classification: 'clean',
    allowAccept: true,
    allowEdit: true,
    defaultDecision: 'accept',
    ...overrides,
  };
}

describe('prompts', () => {
  beforeEach(() => {
    prompt.mockReset();
  });

  describe('nonInteractivePrompter', () => {
    it('should never overwrite and never import', async () => {
      await expect(nonInteractivePrompter.confirmOverwrite('a')).resolves.toBe(false);
      await expect(nonInteractivePrompter.chooseImport('~/.zshrc')).resolves.toBe('skip');
    });
  });

  describe('InquirerPrompter', () => {
    it('should default the overwrite confirmation to no', async () => {
      prompt.mockResolvedValueOnce({ overwrite: true });

      await expect(new InquirerPrompter().confirmOverwrite('a')).resolves.toBe(true);
      expect(prompt).toHaveBeenCalledWith([
        expect.objectContaining({ type: 'confirm', name: 'overwrite', default: false }),
      ]);
    });

    it('should return the chosen import action', async () => {
      prompt.mockResolvedValueOnce({ choice: 'ignore' });
      await expect(new InquirerPrompter().chooseImport('~/.zshrc')).resolves.toBe('ignore');
    });
  });

  describe('InquirerHunkDecider', () => {
    it('should return a plain decision', async () => {
      prompt.mockResolvedValueOnce({ action: 'skip' });
      await expect(new InquirerHunkDecider().decide(request())).resolves.toEqual({ kind: 'skip' });
    });

    it('should offer only the allowed actions', async () => {
      prompt.mockResolvedValueOnce({ action: 'skip' });

      await new InquirerHunkDecider().decide(
        request({ allowAccept: false, allowEdit: false, defaultDecision: 'skip' })
      );

      expect(prompt).toHaveBeenCalledWith([
        expect.objectContaining({
          choices: [{ name: 'Skip (keep source)', value: 'skip' }],
          default: 'skip',
        }),
      ]);
    });

    it('should open an editor seeded with the staged lines', async () => {
      prompt.mockResolvedValueOnce({ action: 'edit' }).mockResolvedValueOnce({ text: 'font_size 13\n' });

      const decision = await new InquirerHunkDecider().decide(request());

      expect(decision).toEqual({ kind: 'edit', text: 'font_size 13\n' });
      expect(prompt).toHaveBeenLastCalledWith([
        expect.objectContaining({ type: 'editor', default: 'font_size 14\n' }),
      ]);
    });
  });

  describe('cancellable', () => {
    function exitError(): Error {
      const error = new Error('User force closed the prompt with SIGINT');
      error.name = 'ExitPromptError';
      return error;
    }

    it('should turn a force-closed prompt into UserCancelledError', async () => {
      await expect(cancellable(Promise.reject(exitError()))).rejects.toBeInstanceOf(UserCancelledError);
    });

    it('should pass other errors through', async () => {
      const error = new Error('no tty');
      await expect(cancellable(Promise.reject(error))).rejects.toBe(error);
    });

    it('should cancel a hunk decision', async () => {
      prompt.mockRejectedValueOnce(exitError());

      await expect(new InquirerHunkDecider().decide(request())).rejects.toThrow('Operation cancelled by user');
    });

    it('should cancel an overwrite confirmation', async () => {
      prompt.mockRejectedValueOnce(exitError());

      await expect(new InquirerPrompter().confirmOverwrite('kitty/kitty.conf')).rejects.toBeInstanceOf(
        UserCancelledError
      );
    });
  });
});
