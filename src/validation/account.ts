import config from '../config.js';
import validateString from './string.js';

const ALLOWED_CHARS = 'abcdefghijklmnopqrstuvwxyz0123456789';
const ALLOWED_CHARS_MIDDLE = '-._';

/**
 * Account names are lowercase alphanumerics, with `-`, `.` and `_` allowed inside.
 */
const validateAccountName = (value: unknown): value is string =>
    validateString(value, config.accountNameMaxLength, config.accountNameMinLength, ALLOWED_CHARS, ALLOWED_CHARS_MIDDLE);

export default validateAccountName;
