export type PriorityTier = 'HIGH' | 'MEDIUM' | 'LOW';

export const PRIORITY_TIERS: readonly PriorityTier[] = ['HIGH', 'MEDIUM', 'LOW'];

export type SourceType = 'web' | 'maps';

export type ResultKind = 'organic' | 'ads' | 'shopping' | 'place';

export interface BusinessContext {
  description: string;
  mustHave: string[];
  excluded: string[];
  sector?: string;
}

export interface PlanConstraints {
  countries: string[];
  citiesPerCountry: number;
  maxTotalQueries: number;
  useNativeLanguage: boolean;
  pagesPerQuery: number;
  includeMaps: boolean;
}

export interface QueryCandidate {
  text: string;
  priority: PriorityTier;
  category: string;
  reasoning: string;
  translations: Record<string, string>;
}

export interface CityTarget {
  countryCode: string;
  city: string;
  locale?: string;
}

export interface ContextAnalysis {
  userBusiness?: string;
  targetCustomerProfile?: string;
  keyCustomerSignals?: string[];
}

export interface QueryPlan {
  id: string;
  revision: number;
  previousPlanId?: string;
  createdAt: string;
  context: BusinessContext;
  constraints: PlanConstraints;
  queries: QueryCandidate[];
  mapsQueries?: QueryCandidate[];
  cities: CityTarget[];
  combinations: number;
  estimatedCalls: number;
  rationale: string;
  analysis?: ContextAnalysis;
}

export interface PlaceDetails {
  businessName: string;
  address: string;
  phone: string;
  website: string;
  rating: number | null;
  reviewCount: number | null;
  category: string;
  placeId: string;
}

export interface SearchResult {
  domain: string;
  url: string;
  title: string;
  description: string;
  sourceType: SourceType;
  resultKind: ResultKind;
  query: string;
  city: string;
  countryCode: string;
  position: number | null;
  place?: PlaceDetails;
}

export interface RelatedSearch {
  originalQuery: string;
  relatedSearch: string;
  source: 'related' | 'autocomplete';
}

export interface DedupStats {
  input: number;
  unique: number;
  duplicates: number;
  withoutKey: number;
}

export interface ResultSet {
  records: Map<string, SearchResult>;
  stats: DedupStats;
}

export interface PipelineOptions {
  phases?: SourceType[];
  mapsCoverage?: 'all' | 'underrepresented';
  resultsPerQuery?: number;
  captureAutocomplete?: boolean;
  checkpointInterval?: number;
  exportXlsx?: boolean;
  dryRun?: boolean;
}
