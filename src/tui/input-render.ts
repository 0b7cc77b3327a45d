import type { Segment } from './frame.js';
import { textWidth, truncateByWidth } from './layout.js';
import type { TextInputState } from './text-input.js';

export interface InputFieldLayout {
  segments: Segment[];
  /** 1-based column of the insertion point. */
  cursorCol: number;
}

/**
 * Lay out `label[value]` in `width` columns. The visible slice of the value
 * scrolls horizontally so the insertion point always stays inside the field.
 */
export function layoutInputField(options: {
  label: string;
  input: TextInputState;
  width: number;
  placeholder?: string;
}): InputFieldLayout {
  const { label, input, width } = options;
  const labelWidth = textWidth(label);
  const available = width - labelWidth;

  if (available < 3) {
    return {
      segments: [{ text: truncateByWidth(label, width), style: 'bold' }],
      cursorCol: Math.max(1, Math.min(width, labelWidth + 1)),
    };
  }

  const fieldWidth = available - 2;
  const chars = Array.from(input.value);
  const cursor = Math.max(0, Math.min(input.cursor, chars.length));
  const cursorChar = chars[cursor] ?? ' ';
  const cursorWidth = Math.max(1, textWidth(cursorChar));

  let start = 0;
  while (start < cursor && textWidth(chars.slice(start, cursor).join('')) + cursorWidth > fieldWidth) {
    start++;
  }
  const before = chars.slice(start, cursor).join('');
  const beforeWidth = textWidth(before);

  let remaining = Math.max(0, fieldWidth - beforeWidth - cursorWidth);
  let after = '';
  if (chars.length === 0 && options.placeholder) {
    after = truncateByWidth(options.placeholder, remaining);
    remaining -= textWidth(after);
  } else {
    for (const ch of chars.slice(cursor + 1)) {
      const w = textWidth(ch);
      if (w > remaining) break;
      after += ch;
      remaining -= w;
    }
  }

  const segments: Segment[] = [
    { text: label, style: 'bold' },
    { text: '[', style: 'dim' },
    { text: before, style: 'field' },
    { text: cursorChar, style: 'fieldCursor' },
    { text: after, style: chars.length === 0 ? 'dim' : 'field' },
    { text: ' '.repeat(remaining), style: 'field' },
    { text: ']', style: 'dim' },
  ];

  return {
    segments: segments.filter((s) => s.text.length > 0),
    cursorCol: labelWidth + 2 + beforeWidth,
  };
}
