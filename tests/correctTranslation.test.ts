import { describe, expect, it } from 'vitest';
import { correctTranslation } from '../src/utils/correctTranslation.js';

describe('correctTranslation', () => {
  it('restores a placeholder the provider turned into a bare word', () => {
    expect(correctTranslation('Hello {name}', 'Bonjour NAME')).toBe('Bonjour {name}');
  });

  it('restores a renamed placeholder', () => {
    expect(correctTranslation('{count} files', '{nombre} fichiers')).toBe('{count} fichiers');
  });

  it('restores several placeholders in source order', () => {
    expect(correctTranslation('{a} of {b}', '{x} de {y}')).toBe('{a} de {b}');
  });

  it('appends a placeholder that has no slot', () => {
    expect(correctTranslation('Welcome {user}', 'Bienvenue')).toBe('Bienvenue {user}');
  });

  it('drops braces the source does not have', () => {
    expect(correctTranslation('Hello', 'Bonjour {x}')).toBe('Bonjour');
  });

  it('normalizes spacing around punctuation', () => {
    expect(correctTranslation('Saved', 'Enregistré !')).toBe('Enregistré!');
    expect(correctTranslation('x', '( hello )')).toBe('(hello)');
    expect(correctTranslation('x', '50 %')).toBe('50%');
  });

  it('joins hyphenated words', () => {
    expect(correctTranslation('e-mail', 'e - mail')).toBe('e-mail');
  });

  it('collapses and trims whitespace', () => {
    expect(correctTranslation('a b', '  a \n  b  ')).toBe('a b');
  });

  it('keeps a braced placeholder when its name also appears as a word', () => {
    expect(correctTranslation('Name: {name}', 'Name: {name}')).toBe('Name: {name}');
    expect(correctTranslation('Email {email} is invalid', "L'email {email} n'est pas valide")).toBe(
      "L'email {email} n'est pas valide",
    );
  });

  it('leaves the spacing inside restored placeholders untouched', () => {
    expect(correctTranslation('Total {a , b}', 'Gesamt {x}')).toBe('Gesamt {a , b}');
    expect(correctTranslation('Rate {value :.1f} %', 'Taux {value :.1f} %')).toBe('Taux {value :.1f}%');
  });
});
