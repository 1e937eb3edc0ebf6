/** How a value was written; decides escape processing and expansion. */
export type QuoteContext = 'unquoted' | 'single' | 'double';
