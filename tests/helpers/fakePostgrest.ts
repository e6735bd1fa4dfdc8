type Row = Record<string, unknown>;

export interface RecordedRequest {
  method: string;
  url: URL;
  body: unknown;
}

export interface FakePostgrest {
  rows: Row[];
  requests: RecordedRequest[];
  failWith: { status: number; message: string } | null;
  insertReturnsNothing: boolean;
  fetch: typeof fetch;
}

function isRow(value: unknown): value is Row {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function jsonResponse(status: number, payload: unknown): Response {
  return new Response(JSON.stringify(payload), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

function requestUrl(input: string | URL | Request): URL {
  if (typeof input === 'string') return new URL(input);
  if (input instanceof URL) return input;
  return new URL(input.url);
}

/**
 * In-process stand-in for the PostgREST endpoint behind a Supabase client.
 * Understands the select/order/limit parameters and single-row inserts.
 */
export function createFakePostgrest(initialRows: Row[] = []): FakePostgrest {
  const fake: FakePostgrest = {
    rows: [...initialRows],
    requests: [],
    failWith: null,
    insertReturnsNothing: false,
    fetch: async (input, init) => {
      const url = requestUrl(input);
      const method = init?.method ?? 'GET';
      const rawBody = init?.body;
      const body: unknown = typeof rawBody === 'string' ? JSON.parse(rawBody) : undefined;
      fake.requests.push({ method, url, body });

      if (fake.failWith) {
        return jsonResponse(fake.failWith.status, { message: fake.failWith.message });
      }

      if (method === 'POST') {
        const inserted = (Array.isArray(body) ? body : [body]).filter(isRow);
        fake.rows.push(...inserted);
        return jsonResponse(201, fake.insertReturnsNothing ? [] : inserted);
      }

      let result = [...fake.rows];
      if (url.searchParams.get('order') === 'id.desc') {
        result.sort((a, b) => Number(b.id) - Number(a.id));
      }

      const limit = url.searchParams.get('limit');
      if (limit !== null) {
        result = result.slice(0, Number(limit));
      }

      const select = url.searchParams.get('select');
      if (select && select !== '*') {
        const columns = select.split(',');
        result = result.map((row) => Object.fromEntries(columns.map((column) => [column, row[column]])));
      }

      return jsonResponse(200, result);
    },
  };

  return fake;
}
