import { parseCatalog, type Catalog } from '../../catalog/catalog.registry.js';

export function testCatalog(): Catalog {
  return parseCatalog({
    equityIndices: {
      'United States': { 'S&P 500': '^GSPC' },
      Europe: { 'DAX (Germany)': '^GDAXI', 'CAC 40 (France)': '^FCHI' },
    },
    equityConstituents: {
      'DAX (Germany)': ['SAP.DE', 'SIE.DE'],
    },
    fx: {
      g10: ['EUR', 'JPY', 'USD'],
      emerging: ['MXN'],
      crosses: { 'EUR/GBP': 'EURGBP=X' },
      correlationDefaults: ['USD', 'EUR', 'JPY'],
    },
    overview: {
      indices: { 'S&P 500': '^GSPC' },
      fxPairs: { 'EUR/USD': 'EURUSD=X' },
      indicators: { VIX: '^VIX' },
    },
    rates: {
      shortTerm: { 'United States': [{ instrument: '3M (13W T-Bill)', ticker: '^IRX' }] },
      tenors: ['2Y', '10Y'],
      countries: ['US', 'Germany'],
      yieldTickers: [
        { country: 'US', tenor: '10Y', ticker: '^TNX' },
        { country: 'Germany', tenor: '10Y', ticker: 'DE10Y' },
      ],
    },
    commodities: {
      Metals: [{ name: 'Gold', ticker: 'GC=F' }],
    },
    centralBanks: [
      { name: 'Federal Reserve', seriesId: 'FEDFUNDS' },
      { name: 'European Central Bank', seriesId: 'ECBDFR' },
      { name: 'Bank of England', seriesId: 'IUDSOIA' },
      { name: 'Bank of Japan', seriesId: 'IRSTCI01JPM156N' },
    ],
  });
}
