export {
  NAME_NORMALIZATION_VERSION,
  normalizeCountryName,
  normalizeCountryNames,
  isMalformedName,
} from './normalization'
export { normalizeColumnName, normalizeColumnNames } from './columns'
