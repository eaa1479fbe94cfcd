/**
 * Decimal constructor for revenue arithmetic.
 *
 * decimal.js rounds every arithmetic result to its constructor's precision,
 * 20 significant digits by default. Sums of revenue must stay exact, so
 * they run on a clone at the library's maximum precision. A result takes
 * the precision of the value the operation is called on.
 */

import Decimal from 'decimal.js';

export const Money = Decimal.clone({ precision: 1e9 });
