// Loadable provider module: the registry reads `serviceProviders`.

import type { ServiceProviderTable } from '../types.js';
import { MOCK_PROVIDER_NAME, MockProvider } from './mock-provider.js';

export { MockProvider, MOCK_PROVIDER_NAME } from './mock-provider.js';

export const serviceProviders = {
  [MOCK_PROVIDER_NAME]: () => new MockProvider(MOCK_PROVIDER_NAME),
} satisfies ServiceProviderTable;
