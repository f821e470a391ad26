// Open data published by the Italian ministry for enterprises:
// https://www.mimit.gov.it/it/open-data/elenco-dataset/carburanti-prezzi-praticati-e-anagrafica-degli-impianti
export const PRICES_CSV_URL = 'https://www.mimit.gov.it/images/exportCSV/prezzo_alle_8.csv';
export const STATIONS_CSV_URL = 'https://www.mimit.gov.it/images/exportCSV/anagrafica_impianti_attivi.csv';

export const FEED_DELIMITER = ';';

// Extraction date line followed by the column header.
export const PRICE_HEADER_LINES = 2;
export const PRICE_FIELD_COUNT = 5;

export const STATION_HEADER_LINES = 1;
export const STATION_FIELD_COUNT = 10;
// Some rows repeat the address column.
export const STATION_FIELD_COUNT_WITH_DUPLICATE_ADDRESS = 11;
