import nock from "nock";

export const PARSE_SERVER = "https://parse.test";
export const PARSE_ROOT = `${PARSE_SERVER}/parse/classes`;
export const PARSE_COLLECTION = "GenericEsl";
export const PARSE_APP_ID = "test-app-id";
export const PARSE_API_KEY = "test-api-key";

const collectionPath = `/parse/classes/${PARSE_COLLECTION}`;

export interface ParseMock {
  scope: nock.Scope;
  create: (response: { objectId: string; createdAt: string }) => void;
  createError: (status: number, code: number, error: string) => void;
  query: (where: Record<string, unknown>, results: unknown[]) => void;
  queryError: (status: number, code: number, error: string) => void;
  update: (objectId: string) => void;
  updateError: (objectId: string, status: number, code: number, error: string) => void;
}

/**
 * Set up nock interceptors for the Parse REST API.
 * Call cleanupParseMock() in afterEach to reset state between tests.
 */
export function setupParseMock(): ParseMock {
  const scope = nock(PARSE_SERVER);

  return {
    scope,

    create(response) {
      scope.post(collectionPath).reply(201, response);
    },

    createError(status, code, error) {
      scope.post(collectionPath).reply(status, { code, error });
    },

    query(where, results) {
      scope
        .get(collectionPath)
        .query({ where: JSON.stringify(where) })
        .reply(200, { results });
    },

    queryError(status, code, error) {
      scope
        .get(collectionPath)
        .query(true)
        .reply(status, { code, error });
    },

    update(objectId) {
      scope
        .put(`${collectionPath}/${objectId}`, { printed: true })
        .reply(200, { updatedAt: "2024-03-01T10:00:00.000Z" });
    },

    updateError(objectId, status, code, error) {
      scope.put(`${collectionPath}/${objectId}`).reply(status, { code, error });
    },
  };
}

export function cleanupParseMock(): void {
  nock.cleanAll();
}

/**
 * A Parse object as the server returns it, with every optional field unset.
 */
export function createEslFixture(
  overrides: Record<string, unknown> & { objectId: string },
): Record<string, unknown> {
  return {
    type: "Hanshow",
    serial: "DEV-42",
    printed: false,
    eslId: `label-${overrides.objectId}`,
    createdAt: "2024-03-01T09:00:00.000Z",
    updatedAt: "2024-03-01T09:00:00.000Z",
    ...overrides,
  };
}
