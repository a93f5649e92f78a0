import { describe, expect, it } from 'vitest';
import {
  LINK_END,
  LINK_START,
  STYLE_START,
  anchorMarker,
  decodeInline,
  linkClose,
  linkOpen,
  stripMarkers,
  styleClose,
  wrapStyle,
} from '../src/layout/markers.js';
import { defaultTextStyle } from '../src/types.js';

describe('decodeInline', () => {
  it('resolves style spans', () => {
    expect(decodeInline(`${wrapStyle('bold', 'b')} plain`)).toEqual([
      { kind: 'span', text: 'bold', style: { ...defaultTextStyle(), bold: true } },
      { kind: 'span', text: ' plain', style: defaultTextStyle() },
    ]);
  });

  it('renders code style as dim reverse text', () => {
    const [piece] = decodeInline(wrapStyle('x = 1', 'c'));
    expect(piece).toEqual({
      kind: 'span',
      text: 'x = 1',
      style: { ...defaultTextStyle(), dim: true, reverse: true },
    });
  });

  it('keeps overlapping identical styles active until the last close', () => {
    const text = `${wrapStyle(`a${wrapStyle('b', 'i')}c`, 'i')}d`;
    expect(decodeInline(text).map((piece) => (piece.kind === 'span' ? piece.style.italic : null))).toEqual([
      true,
      true,
      true,
      false,
    ]);
  });

  it('tracks the active link until an empty link span', () => {
    expect(decodeInline(`${linkOpen('ch2.xhtml#n1')}next${linkClose()} page`)).toEqual([
      { kind: 'span', text: 'next', style: defaultTextStyle(), link: 'ch2.xhtml#n1' },
      { kind: 'span', text: ' page', style: defaultTextStyle() },
    ]);
  });

  it('ignores a close without a matching open', () => {
    expect(decodeInline(`${styleClose('b')}${wrapStyle('x', 'b')}`)).toEqual([
      { kind: 'span', text: 'x', style: { ...defaultTextStyle(), bold: true } },
    ]);
  });

  it('keeps link targets as written and closes on a blank target', () => {
    expect(decodeInline(`${LINK_START} n1 ${LINK_END}a${LINK_START}  ${LINK_END}b`)).toEqual([
      { kind: 'span', text: 'a', style: defaultTextStyle(), link: ' n1 ' },
      { kind: 'span', text: 'b', style: defaultTextStyle() },
    ]);
  });

  it('emits anchors as zero-width events', () => {
    expect(decodeInline(`a${anchorMarker('here')}b`)).toEqual([
      { kind: 'span', text: 'a', style: defaultTextStyle() },
      { kind: 'anchor', name: 'here' },
      { kind: 'span', text: 'b', style: defaultTextStyle() },
    ]);
  });

  it('keeps an incomplete style marker at the end as literal text', () => {
    expect(decodeInline(`abc${STYLE_START}`)).toEqual([
      { kind: 'span', text: `abc${STYLE_START}`, style: defaultTextStyle() },
    ]);
  });

  it('keeps an unknown style code as literal text', () => {
    expect(stripMarkers(`${STYLE_START}qtext`)).toBe(`${STYLE_START}qtext`);
  });

  it('keeps an unclosed link with everything after it', () => {
    expect(stripMarkers(`a${LINK_START}target`)).toBe(`a${LINK_START}target`);
  });
});

describe('marker encoders', () => {
  it('produce nothing for empty link targets and anchor names', () => {
    expect(linkOpen('   ')).toBe('');
    expect(anchorMarker('')).toBe('');
  });

  it('strip back to the rendered text', () => {
    const text = `${anchorMarker('n1')}See ${linkOpen('x')}${wrapStyle('this', 'b')}${linkClose()}.`;
    expect(stripMarkers(text)).toBe('See this.');
    expect(stripMarkers('plain')).toBe('plain');
  });
});
