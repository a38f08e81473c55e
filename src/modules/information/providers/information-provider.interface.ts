import { InformationItem, InformationQuery } from '../interfaces/information.interface';

/**
 * Backing implementation of an information source. A source only answers
 * the levels it has a method for.
 */
export interface InformationProvider {
  fetchFarmerItems?(query: InformationQuery): Promise<InformationItem[]>;
  fetchCountryItems?(query: InformationQuery): Promise<InformationItem[]>;
  fetchGlobalItems?(query: InformationQuery): Promise<InformationItem[]>;
}
