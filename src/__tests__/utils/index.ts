/**
 * Test utilities index file
 */

export { TestDataBuilder } from "./test-data.builders";
export {
  FakeHttpClient,
  FakeRequestGateway,
  InMemoryDocumentStore,
  StubPriceSource,
  createFakeClientFactory,
  errorResult,
  quoteResult,
} from "./mock.factories";
