import {stringify} from 'csv-stringify';
import type {Options} from 'csv-stringify';

export const CSV_MEDIA_TYPE = 'text/csv';
export const DEFAULT_CSV_DELIMITER = ';';

const castOptions: Options['cast'] = {
    boolean: (value: boolean) => String(value),
    date: (value: Date) => value.toISOString(),
    object: (value: object) => JSON.stringify(value),
};

const stringifyAsync = (input: unknown[][] | object[], options: Options): Promise<string> =>
    new Promise((resolve, reject) => {
        stringify(input, options, (error, output) => {
            if (error) {
                reject(error);
                return;
            }
            resolve(output ?? '');
        });
    });

/**
 * Serialize rows to delimited text with a header line.
 *
 * Columns default to the keys of the first row. With no rows the result is the
 * header alone when columns are given, otherwise an empty document.
 */
export const toCsv = async (
    rows: readonly object[],
    delimiter: string = DEFAULT_CSV_DELIMITER,
    columns?: readonly string[]
): Promise<string> => {
    const firstRow = rows[0];
    const header = columns ?? (firstRow ? Object.keys(firstRow) : []);

    if (rows.length === 0) {
        return header.length > 0 ? stringifyAsync([[...header]], {delimiter}) : '';
    }

    return stringifyAsync([...rows], {
        delimiter,
        header: true,
        columns: [...header],
        cast: castOptions,
    });
};

/**
 * `exportYYYYMMDDHHmmss.csv`, in UTC
 */
export const buildExportFileName = (now: Date): string =>
    `export${now.toISOString().replace(/[-:T]/g, '').slice(0, 14)}.csv`;
