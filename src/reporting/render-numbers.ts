/**
 * Number and duration formatting for terminal reports.
 */

const VALUE_SIG_FIGS = 3;

/**
 * Format a metric value.
 *
 * - Integers: formatted with commas
 * - Floats: at least 1 decimal place and at least 3 significant figures
 */
export function renderNumber(value: number): string {
  if (!Number.isFinite(value)) {
    return String(value);
  }
  if (Number.isInteger(value)) {
    return formatWithCommas(value, 0);
  }

  const absVal = Math.abs(value);
  let decimals: number;
  if (absVal >= 1) {
    const digits = Math.floor(Math.log10(absVal)) + 1;
    decimals = Math.max(1, VALUE_SIG_FIGS - digits);
  } else {
    const exponent = Math.floor(Math.log10(absVal));
    decimals = -exponent + VALUE_SIG_FIGS - 1;
  }

  return formatWithCommas(value, decimals);
}

/**
 * Format a duration given in seconds.
 */
export function renderDuration(seconds: number): string {
  if (seconds === 0) {
    return '0s';
  }

  let precision = 1;
  let value: number;
  let unit: string;
  const absSeconds = Math.abs(seconds);

  if (absSeconds < 1e-3) {
    value = seconds * 1_000_000;
    unit = 'µs';
    if (Math.abs(value) >= 1) {
      precision = 0;
    }
  } else if (absSeconds < 1) {
    value = seconds * 1_000;
    unit = 'ms';
  } else {
    value = seconds;
    unit = 's';
  }

  return `${formatWithCommas(value, precision)}${unit}`;
}

function formatWithCommas(value: number, decimals: number): string {
  const [intDigits, fraction] = Math.abs(value).toFixed(decimals).split('.');
  const intPart = intDigits.replace(/\B(?=(\d{3})+(?!\d))/g, ',');
  const sign = value < 0 ? '-' : '';
  return fraction ? `${sign}${intPart}.${fraction}` : `${sign}${intPart}`;
}
