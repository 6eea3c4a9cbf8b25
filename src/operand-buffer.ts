import type { Digit } from './keys.js';

const PLAIN_DECIMAL = /^-?\d+(?:\.\d*)?$/;

/**
 * Text of a number being typed. The "has decimal point" flag is read off the
 * text itself, so a buffer can never hold two decimal points.
 */
export class OperandBuffer {
  constructor(private text: string = '') {}

  get value(): string {
    return this.text;
  }

  get isEmpty(): boolean {
    return this.text === '';
  }

  get hasDecimalPoint(): boolean {
    return this.text.includes('.');
  }

  /**
   * Results like "Infinity" or "1e+21" cannot be extended by typing;
   * the next digit or decimal point starts a fresh number instead.
   */
  get isEditable(): boolean {
    return this.isEmpty || PLAIN_DECIMAL.test(this.text);
  }

  /** Text shown for this buffer, "0" while empty. */
  get displayText(): string {
    return this.text || '0';
  }

  appendDigit(digit: Digit): void {
    if (!this.isEditable) {
      this.text = '';
    }
    this.text += String(digit);
  }

  /**
   * Returns false when the buffer already has a decimal point.
   */
  appendDecimalPoint(): boolean {
    if (!this.isEditable) {
      this.text = '';
    }
    if (this.hasDecimalPoint) {
      return false;
    }
    this.text = this.isEmpty ? '0.' : `${this.text}.`;
    return true;
  }

  replace(text: string): void {
    this.text = text;
  }

  clear(): void {
    this.text = '';
  }
}
