import { describe, it, expect } from 'vitest';
import { computeHunks } from './hunks.js';
import {
  CONFLICT_ANNOTATION,
  LINE_COUNT_ANNOTATION,
  TEMPLATE_ANNOTATION,
  allowedDecisions,
  classifyHunks,
  defaultDecision,
  editLines,
  mergeHunks,
} from './merge.js';

describe('classifyHunks', () => {
  const generated = ['size 12\n', 'b\n', 'c\n'];
  const staged = ['size 14\n', 'b\n', 'C\n'];

  it('should mark hunks whose source lines match as clean', () => {
    const classified = classifyHunks(generated, generated, computeHunks(generated, staged), true);

    expect(classified.map((c) => c.classification)).toEqual(['clean', 'clean']);
    expect(classified[0].sourceLines).toEqual(['size 12\n']);
    expect(classified[0].annotation).toBeUndefined();
  });

  it('should mark hunks over template expressions', () => {
    const source = ['size {{ size }}\n', 'b\n', 'c\n'];

    const classified = classifyHunks(source, generated, computeHunks(generated, staged), true);

    expect(classified[0]).toMatchObject({
      classification: 'template',
      annotation: TEMPLATE_ANNOTATION,
      sourceLines: ['size {{ size }}\n'],
    });
    expect(classified[1].classification).toBe('clean');
  });

  it('should treat template markers as text when templating is off', () => {
    const source = ['size {{ size }}\n', 'b\n', 'c\n'];

    const classified = classifyHunks(source, source, computeHunks(source, ['x\n', 'b\n', 'c\n']), false);

    expect(classified[0].classification).toBe('clean');
  });

  it('should mark independently edited source lines as conflicts', () => {
    const source = ['size 12\n', 'b\n', 'c2\n'];

    const classified = classifyHunks(source, generated, computeHunks(generated, staged), true);

    expect(classified[1]).toMatchObject({ classification: 'conflict', annotation: CONFLICT_ANNOTATION });
  });

  it('should mark an insertion a conflict when a plain source was edited elsewhere', () => {
    const plainGenerated = ['a\n', 'b\n', 'c\n'];
    const source = ['x\n', 'a\n', 'b\n', 'c\n'];
    const hunks = computeHunks(plainGenerated, ['a\n', 'b\n', 'NEW\n', 'c\n']);

    const classified = classifyHunks(source, plainGenerated, hunks, false);

    expect(classified).toHaveLength(1);
    expect(classified[0]).toMatchObject({
      classification: 'conflict',
      annotation: CONFLICT_ANNOTATION,
      sourceLines: [],
    });
    expect(mergeHunks(source, classified, [{ kind: 'accept' }])).toEqual({
      lines: source,
      applied: 0,
      unresolved: [1],
    });
  });

  it('should mark an insertion a conflict when the source around it moved', () => {
    const templateGenerated = ['a\n', 'b\n', 'c\n'];
    const source = ['x\n', 'a\n', 'b\n'];
    const hunks = computeHunks(templateGenerated, ['a\n', 'b\n', 'NEW\n', 'c\n']);

    const classified = classifyHunks(source, templateGenerated, hunks, true);

    expect(classified[0]).toMatchObject({ classification: 'conflict', annotation: CONFLICT_ANNOTATION });
  });

  it('should not compare context lines that carry template syntax', () => {
    const source = ['size {{ size }}\n', 'b\n', 'c\n'];
    const hunks = computeHunks(generated, ['size 12\n', 'NEW\n', 'b\n', 'c\n']);

    const classified = classifyHunks(source, generated, hunks, true);

    expect(classified[0].classification).toBe('clean');
  });

  it('should mark every hunk a conflict when the template changes the line count', () => {
    const source = ['{% if true %}\n', 'size 12\n', '{% endif %}\n', 'b\n', 'c\n'];

    const classified = classifyHunks(source, generated, computeHunks(generated, staged), true);

    expect(classified.map((c) => c.annotation)).toEqual([LINE_COUNT_ANNOTATION, LINE_COUNT_ANNOTATION]);
  });
});

describe('decisions', () => {
  it('should default to accept only for clean hunks', () => {
    expect(defaultDecision('clean')).toBe('accept');
    expect(defaultDecision('template')).toBe('skip');
    expect(defaultDecision('conflict')).toBe('skip');
  });

  it('should allow accept except on conflicts and edit except on unmapped lines', () => {
    const hunk = { oldStart: 0, oldLines: [], newStart: 0, newLines: [], contextBefore: [], contextAfter: [] };

    expect(allowedDecisions({ hunk, classification: 'clean', sourceLines: [] })).toEqual({ accept: true, edit: true });
    expect(
      allowedDecisions({ hunk, classification: 'conflict', annotation: CONFLICT_ANNOTATION, sourceLines: [] })
    ).toEqual({ accept: false, edit: true });
    expect(
      allowedDecisions({ hunk, classification: 'conflict', annotation: LINE_COUNT_ANNOTATION, sourceLines: [] })
    ).toEqual({ accept: false, edit: false });
  });
});

describe('editLines', () => {
  it('should add a newline when the replaced lines ended with one', () => {
    expect(editLines('x', ['a\n'])).toEqual(['x\n']);
    expect(editLines('x', [])).toEqual(['x\n']);
    expect(editLines('x\ny\n', ['a\n'])).toEqual(['x\n', 'y\n']);
  });

  it('should keep a missing final newline', () => {
    expect(editLines('x', ['a'])).toEqual(['x']);
  });

  it('should turn empty text into a deletion', () => {
    expect(editLines('', ['a\n'])).toEqual([]);
  });
});

describe('mergeHunks', () => {
  const source = ['a\n', 'b\n', 'c\n', 'd\n', 'e\n'];
  const staged = ['A1\n', 'A2\n', 'b\n', 'c\n', 'D\n', 'e\n'];
  const classified = classifyHunks(source, source, computeHunks(source, staged), false);

  it('should shift later hunks by the lines earlier hunks added', () => {
    const result = mergeHunks(source, classified, [{ kind: 'accept' }, { kind: 'accept' }]);

    expect(result).toEqual({ lines: staged, applied: 2, unresolved: [] });
  });

  it('should leave skipped hunks alone', () => {
    const result = mergeHunks(source, classified, [{ kind: 'skip' }, { kind: 'accept' }]);

    expect(result.lines).toEqual(['a\n', 'b\n', 'c\n', 'D\n', 'e\n']);
    expect(result.applied).toBe(1);
  });

  it('should treat missing decisions as skips', () => {
    expect(mergeHunks(source, classified, []).lines).toEqual(source);
  });

  it('should apply an edit in place of the hunk', () => {
    const result = mergeHunks(source, classified, [{ kind: 'edit', text: 'z' }, { kind: 'skip' }]);

    expect(result.lines).toEqual(['z\n', 'b\n', 'c\n', 'd\n', 'e\n']);
  });

  it('should never accept a conflict and report it unresolved', () => {
    const edited = ['a\n', 'b\n', 'c\n', 'd2\n', 'e\n'];
    const conflicts = classifyHunks(edited, source, computeHunks(source, staged), false);

    const result = mergeHunks(edited, conflicts, [{ kind: 'accept' }, { kind: 'accept' }]);

    expect(conflicts.map((c) => c.classification)).toEqual(['conflict', 'conflict']);
    expect(result).toEqual({ lines: edited, applied: 0, unresolved: [1, 2] });
  });

  it('should resolve a conflict through an edit', () => {
    const edited = ['a\n', 'b\n', 'c\n', 'd2\n', 'e\n'];
    const conflicts = classifyHunks(edited, source, computeHunks(source, staged), false);

    const result = mergeHunks(edited, conflicts, [
      { kind: 'edit', text: 'A1\nA2' },
      { kind: 'edit', text: 'D2' },
    ]);

    expect(result).toEqual({ lines: ['A1\n', 'A2\n', 'b\n', 'c\n', 'D2\n', 'e\n'], applied: 2, unresolved: [] });
  });
});
