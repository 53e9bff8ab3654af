/**
 * Exact decimal handling for persisted measurements.
 *
 * Values are kept as canonical decimal text from the CSV cell all the way to
 * storage, so "57.1" is stored as "57.1" and never as 57.099999...
 */

import type { DecimalString } from '../types';

const DECIMAL_PATTERN = /^([+-]?)(\d*)(?:\.(\d*))?(?:[eE]([+-]?\d+))?$/;
const MAX_EXPONENT = 1000;

/**
 * Canonicalise a decimal literal: no sign for zero, no leading zeros in the
 * integer part, no trailing zeros in the fraction. Exponent notation is
 * expanded by moving the decimal point, so "1.25e1" becomes "12.5".
 */
export function toDecimalString(raw: string): DecimalString {
	const trimmed = raw.trim();
	const match = DECIMAL_PATTERN.exec(trimmed);
	if (!match) {
		throw new Error(`"${raw}" is not a plain decimal number`);
	}

	const [, sign, intDigits = '', fracDigits = '', exponentText] = match;
	if (intDigits === '' && fracDigits === '') {
		throw new Error(`"${raw}" is not a plain decimal number`);
	}

	const exponent = exponentText === undefined ? 0 : Number(exponentText);
	if (Math.abs(exponent) > MAX_EXPONENT) {
		throw new Error(`"${raw}" is out of range`);
	}

	const digits = intDigits + fracDigits;
	const point = intDigits.length + exponent;
	let integerPart: string;
	let fractionPart: string;
	if (point <= 0) {
		integerPart = '';
		fractionPart = '0'.repeat(-point) + digits;
	} else if (point >= digits.length) {
		integerPart = digits + '0'.repeat(point - digits.length);
		fractionPart = '';
	} else {
		integerPart = digits.slice(0, point);
		fractionPart = digits.slice(point);
	}

	const integer = integerPart.replace(/^0+(?=\d)/, '') || '0';
	const fraction = fractionPart.replace(/0+$/, '');
	const body = fraction ? `${integer}.${fraction}` : integer;
	const isZero = /^0(\.0*)?$/.test(body);

	return sign === '-' && !isZero ? `-${body}` : body;
}

/**
 * Integer part of a stored decimal, truncated toward zero. Missing or
 * unreadable values read as 0.
 */
export function decimalToInteger(value: DecimalString | undefined): number {
	if (value === undefined) return 0;
	return Math.trunc(Number(value)) || 0;
}
