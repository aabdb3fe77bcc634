export { CompaniesCsvError, parseCompaniesCsv, parseCsvRows, readCompaniesCsv } from "./companiesCsv";
export { formatResultsJson, writeResultsJson } from "./resultsJson";
