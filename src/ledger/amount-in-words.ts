const ONES = ['', 'One', 'Two', 'Three', 'Four', 'Five', 'Six', 'Seven', 'Eight', 'Nine'];
const TEENS = [
  'Ten',
  'Eleven',
  'Twelve',
  'Thirteen',
  'Fourteen',
  'Fifteen',
  'Sixteen',
  'Seventeen',
  'Eighteen',
  'Nineteen',
];
const TENS = ['', '', 'Twenty', 'Thirty', 'Forty', 'Fifty', 'Sixty', 'Seventy', 'Eighty', 'Ninety'];

/** Largest amount (exclusive) with a spelled-out form. */
export const WORDS_LIMIT = 100000;

function belowThousand(value: number): string[] {
  const words: string[] = [];
  let rest = value;

  if (rest >= 100) {
    words.push(ONES[Math.floor(rest / 100)], 'Hundred');
    rest %= 100;
  }
  if (rest >= 20) {
    words.push(TENS[Math.floor(rest / 10)]);
    rest %= 10;
  } else if (rest >= 10) {
    words.push(TEENS[rest - 10]);
    rest = 0;
  }
  if (rest > 0) {
    words.push(ONES[rest]);
  }

  return words;
}

/**
 * Integer part of `amount` in words, e.g. 1250.75 -> "One Thousand Two
 * Hundred Fifty". Amounts of 100000 and above, negative or non-finite
 * amounts are returned as a plain two-decimal number.
 */
export function amountToWords(amount: number): string {
  if (!Number.isFinite(amount) || amount < 0 || amount >= WORDS_LIMIT) {
    return amount.toFixed(2);
  }

  const whole = Math.trunc(amount);
  if (whole === 0) {
    return 'Zero';
  }

  const thousands = Math.floor(whole / 1000);
  const words = thousands > 0 ? [...belowThousand(thousands), 'Thousand'] : [];
  return [...words, ...belowThousand(whole % 1000)].join(' ');
}
