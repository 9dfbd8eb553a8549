/**
 * Tests for terminal rendering
 */
import { describe, it, expect } from 'vitest';
import pc from 'picocolors';
import { parse } from '../src/parser/index.js';
import { AnsiRenderer, boxTable } from '../src/renderers/index.js';

const renderer = new AnsiRenderer();

function plain(text: string): string {
  return renderer.render(parse(text).document, { color: false });
}

describe('AnsiRenderer', () => {
  it('should emit no escape sequences without color', () => {
    const output = plain(
      '# Title\n\n**bold** and *em*\n\n::callout[type=danger]\nCareful\n::\n\n::metric[label="Up", value=1, trend=up]\n::'
    );
    expect(output).not.toContain('\x1b');
  });

  it('should style output with color', () => {
    const output = renderer.render(parse('::callout[type=info]\nx\n::').document, { color: true });
    expect(output).toContain('\x1b[1mInfo\x1b[22m');
  });

  it('should border callouts', () => {
    expect(plain('::callout[type=tip, title="Hint"]\nUse bold.\n::')).toBe('│ Tip: Hint\n│ Use bold.');
  });

  it('should render prose headings and lists', () => {
    expect(plain('# Title\n\n- one\n- two')).toBe('Title\n\n• one\n• two');
  });

  it('should render tasks with check marks', () => {
    expect(plain('::tasks\n- [x] Ship @dana\n- [ ] Docs\n::')).toBe('✓ Ship @dana\n☐ Docs');
  });

  it('should keep the body of blocks whose content did not parse', () => {
    expect(plain('::tasks\nShip the release notes\n::')).toBe('Ship the release notes');
    expect(plain('::data[format=json]\n{"q4": 4200}\n::')).toBe('{"q4": 4200}');
  });

  it('should render data as a box table', () => {
    expect(plain('::data\n| A | Name |\n|---|---|\n| 1 | Bob |\n::')).toBe(
      ['┌───┬──────┐', '│ A │ Name │', '├───┼──────┤', '│ 1 │ Bob  │', '└───┴──────┘'].join('\n')
    );
  });

  it('should render code between rules', () => {
    expect(plain('::code[lang=ts]\nlet a;\n::')).toBe('─── ts\n  let a;\n───');
    expect(plain('::code[lang=ts, file="a.ts"]\nlet a;\n::')).toBe('─── a.ts\n  let a;\n───');
  });

  it('should render a decision with a status badge', () => {
    expect(plain('::decision[status=accepted, date="2026-01-05", options=["A", "B"], outcome=B]\nWhy.\n::')).toBe(
      '[ACCEPTED] Decision (2026-01-05)\nOptions: A, B ✓\nOutcome: B\nWhy.'
    );
    expect(plain('::decision[status=proposed, deciders=["Ana", "Bo"]]\nOpen.\n::')).toBe(
      '[PROPOSED] Decision\nDeciders: Ana, Bo\nOpen.'
    );
  });

  it('should render metrics, figures and calls to action on one line', () => {
    expect(plain('::metric[label="MRR", value=4200, unit=usd, trend=up]\n::')).toBe('MRR: 4200 usd ↑');
    expect(plain('::figure[src="a.png", caption="Q1"]\n::')).toBe('[Figure: Q1] (a.png)');
    expect(plain('::cta[label="Go", href="/start"]\n::')).toBe('[CTA] Go (/start)');
  });

  it('should label tabs and FAQ entries', () => {
    expect(plain('::tabs\n## One\nFirst\n::')).toBe('[Tab 1] One\nFirst');
    expect(plain('::faq\n### Free?\nYes.\n::')).toBe('Q1: Free?\n  Yes.');
  });

  it('should show site configuration and pages', () => {
    expect(plain('::site[name="Acme"]\n::page[route="/docs", layout=wide]\nHi\n::\n::')).toBe(
      '[Site Config]\n  name: Acme\n\n[Page /docs layout=wide]\nHi'
    );
  });

  it('should show unknown blocks with their raw body', () => {
    expect(plain('::widget\nraw *text*\n::')).toBe('[widget]\nraw *text*');
  });

  it('should pad box table cells to the widest entry', () => {
    const c = pc.createColors(false);
    expect(boxTable(['Key'], [['a'], ['longer']], c)).toBe(
      ['┌────────┐', '│ Key    │', '├────────┤', '│ a      │', '│ longer │', '└────────┘'].join('\n')
    );
    expect(boxTable([], [], c)).toBe('');
  });
});
