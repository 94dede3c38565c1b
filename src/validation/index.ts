import accountName from './account.js';
import bigint from './bigint.js';
import integer from './integer.js';
import object from './object.js';
import string from './string.js';

/**
 * Validation module with functions for validating different data types
 */
const validation = {
    accountName,
    bigint,
    integer,
    object,
    string,
};

export default validation;
