import { ErrorCode } from '../../errors/types';
import { toPlanRow, toUpdateRow } from '../plan-store';
import { SupabasePlanStore, createServiceClient } from '../supabase-plan-store';
import { sampleRecord } from './memory-plan-store';

interface FakeCall {
    method: string;
    path: string;
    params: URLSearchParams;
    headers: Headers;
    body: unknown;
}

const jsonResponse = (body: unknown, status = 200) =>
    new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });

/**
 * supabase-js client whose HTTP calls are answered in process
 */
function fakeStore(respond: (call: FakeCall) => Response | Promise<Response>) {
    const calls: FakeCall[] = [];
    const fetchImpl: typeof fetch = async (input, init) => {
        const url = new URL(typeof input === 'string' ? input : input instanceof URL ? input.href : input.url);
        const rawBody = init?.body;
        const call: FakeCall = {
            method: init?.method ?? 'GET',
            path: url.pathname,
            params: url.searchParams,
            headers: new Headers(init?.headers),
            body: typeof rawBody === 'string' ? JSON.parse(rawBody) : undefined
        };
        calls.push(call);
        return respond(call);
    };

    const client = createServiceClient('https://example.supabase.co', 'test-secret', fetchImpl);
    return { store: new SupabasePlanStore(client), calls };
}

const key = { planName: 'Aspen', specLevel: 'Premium', clientSubdivision: 'Willow Creek' };

describe('SupabasePlanStore', () => {
    let consoleLogSpy: jest.SpyInstance;

    beforeEach(() => {
        consoleLogSpy = jest.spyOn(console, 'log').mockImplementation();
    });

    afterEach(() => {
        consoleLogSpy.mockRestore();
    });

    describe('findByNaturalKey', () => {
        it('should filter on the three key columns with the bearer key', async () => {
            const { store, calls } = fakeStore(() => jsonResponse([]));

            await expect(store.findByNaturalKey(key)).resolves.toBeNull();

            expect(calls).toHaveLength(1);
            expect(calls[0].method).toBe('GET');
            expect(calls[0].path).toBe('/rest/v1/house_plans');
            expect(calls[0].params.get('select')).toBe('id');
            expect(calls[0].params.get('plan_name')).toBe('eq.Aspen');
            expect(calls[0].params.get('spec_level')).toBe('eq.Premium');
            expect(calls[0].params.get('client_subdivision')).toBe('eq.Willow Creek');
            expect(calls[0].headers.get('Authorization')).toBe('Bearer test-secret');
        });

        it('should return the id of the single match', async () => {
            const { store } = fakeStore(() => jsonResponse([{ id: 7 }]));

            await expect(store.findByNaturalKey(key)).resolves.toEqual({ key, id: 7 });
        });

        it('should raise on more than one match', async () => {
            const { store } = fakeStore(() => jsonResponse([{ id: 7 }, { id: 9 }]));

            await expect(store.findByNaturalKey(key)).rejects.toMatchObject({ code: ErrorCode.DB_DUPLICATE_NATURAL_KEY });
        });

        it('should reject rows without an id', async () => {
            const { store } = fakeStore(() => jsonResponse([{ plan_name: 'Aspen' }]));

            await expect(store.findByNaturalKey(key)).rejects.toMatchObject({ code: ErrorCode.DB_INVALID_RESPONSE });
        });

        it('should map a rejected key to an auth error', async () => {
            const { store } = fakeStore(() => jsonResponse({ message: 'Invalid API key' }, 401));

            await expect(store.findByNaturalKey(key)).rejects.toMatchObject({
                code: ErrorCode.AUTH_UNAUTHORIZED,
                message: 'Invalid API key'
            });
        });

        it('should map a transport failure to a network error', async () => {
            const { store } = fakeStore(() => Promise.reject(new TypeError('fetch failed')));

            await expect(store.findByNaturalKey(key)).rejects.toMatchObject({ code: ErrorCode.NETWORK_ERROR });
        });
    });

    describe('insert', () => {
        it('should POST the full row', async () => {
            const { store, calls } = fakeStore(() => new Response(null, { status: 201 }));

            await store.insert(sampleRecord);

            expect(calls[0].method).toBe('POST');
            expect(calls[0].path).toBe('/rest/v1/house_plans');
            expect(calls[0].body).toEqual(toPlanRow(sampleRecord));
        });

        it('should map a unique violation to a constraint error', async () => {
            const { store } = fakeStore(() =>
                jsonResponse(
                    {
                        code: '23505',
                        message: 'duplicate key value violates unique constraint "house_plans_natural_key"',
                        details: 'Key already exists.',
                        hint: null
                    },
                    409
                )
            );

            await expect(store.insert(sampleRecord)).rejects.toMatchObject({
                code: ErrorCode.DB_CONSTRAINT_VIOLATION,
                appError: { context: { operation: 'insert', details: 'Key already exists.', driverCode: '23505', status: 409 } }
            });
        });
    });

    describe('update', () => {
        it('should PATCH the non-key columns by id', async () => {
            const { store, calls } = fakeStore(() => jsonResponse([{ id: 7 }]));

            await store.update({ key, id: 7 }, sampleRecord);

            expect(calls[0].method).toBe('PATCH');
            expect(calls[0].params.get('id')).toBe('eq.7');
            expect(calls[0].params.get('select')).toBe('id');
            expect(calls[0].body).toEqual(toUpdateRow(sampleRecord));
        });

        it('should raise when the row vanished before the update', async () => {
            const { store } = fakeStore(() => jsonResponse([]));

            await expect(store.update({ key, id: 7 }, sampleRecord)).rejects.toMatchObject({
                code: ErrorCode.DB_QUERY_FAILED,
                message: 'No row matched the plan key Aspen / Premium / Willow Creek during update'
            });
        });

        it('should raise when the PATCH answers without a body', async () => {
            const { store } = fakeStore(() => new Response(null, { status: 204 }));

            await expect(store.update({ key, id: 7 }, sampleRecord)).rejects.toMatchObject({
                code: ErrorCode.DB_QUERY_FAILED
            });
        });

        it('should refuse a match without an id', async () => {
            const { store, calls } = fakeStore(() => new Response(null, { status: 204 }));

            await expect(store.update({ key, id: null }, sampleRecord)).rejects.toMatchObject({
                code: ErrorCode.DB_INVALID_RESPONSE
            });
            expect(calls).toHaveLength(0);
        });
    });
});
