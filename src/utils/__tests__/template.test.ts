import { renderTemplate } from '../template';

describe('renderTemplate', () => {
  it('should replace known placeholders', () => {
    expect(renderTemplate('Briefing for {current_date}', { current_date: 'Monday' })).toBe(
      'Briefing for Monday',
    );
  });

  it('should leave unknown placeholders untouched', () => {
    expect(renderTemplate('{a} and {missing}', { a: '1' })).toBe('1 and {missing}');
  });

  it('should not expand placeholders inside substituted values', () => {
    expect(renderTemplate('{headlines} {movers}', { headlines: 'Rates {movers}', movers: 'none' })).toBe(
      'Rates {movers} none',
    );
  });
});
