/**
 * Portal connection tests
 *
 * fetch is replaced with a mock; no request leaves the process.
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { ArcGISConnection, toAdminServiceUrl } from '../../../arcgis/connection.js';
import { PortalHttpClient } from '../../../arcgis/http-client.js';
import { RemoteCallError } from '../../../core/errors.js';
import { buildServiceDefinition } from '../../../publishing/service-definition.js';

const SERVICE_URL = 'https://services.example.test/arcgis/rest/services/GTFS_Stops/FeatureServer';

function jsonResponse(data: unknown, init: ResponseInit = {}): Response {
  return new Response(JSON.stringify(data), { status: 200, ...init });
}

describe('ArcGISConnection', () => {
  const fetchMock = vi.fn<typeof fetch>();
  let connection: ArcGISConnection;

  beforeEach(() => {
    fetchMock.mockReset();
    connection = new ArcGISConnection(
      { url: 'https://portal.example.test/', username: 'transit admin', token: 'test-token' },
      new PortalHttpClient({ token: 'test-token', fetch: fetchMock })
    );
  });

  function request(index = 0): { url: string; init: RequestInit | undefined } {
    const call = fetchMock.mock.calls[index];
    if (call === undefined) {
      throw new Error(`fetch was not called ${index + 1} time(s)`);
    }
    const [input, init] = call;
    return { url: String(input), init };
  }

  function formBody(index = 0): URLSearchParams {
    const body = request(index).init?.body;
    if (!(body instanceof URLSearchParams)) {
      throw new Error('expected a url-encoded body');
    }
    return body;
  }

  async function captureError(promise: Promise<unknown>): Promise<RemoteCallError> {
    try {
      await promise;
    } catch (error) {
      if (error instanceof RemoteCallError) return error;
      throw error;
    }
    throw new Error('expected the call to fail');
  }

  describe('requests', () => {
    it('creates a group with form parameters, format and token', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse({ success: true, group: { id: 'g1', title: 'GTFS Import' } }));

      const group = await connection.createGroup({ title: 'GTFS Import', access: 'account', description: 'An import' });

      expect(group).toEqual({ id: 'g1', title: 'GTFS Import' });
      const { url, init } = request();
      expect(url).toBe('https://portal.example.test/sharing/rest/community/createGroup');
      expect(init?.method).toBe('POST');
      expect(init?.headers).toEqual({ 'User-Agent': 'gtfs-publisher/0.1' });
      expect(Object.fromEntries(formBody())).toEqual({
        title: 'GTFS Import',
        access: 'account',
        description: 'An import',
        f: 'json',
        token: 'test-token',
      });
    });

    it('uploads items as multipart under the user content path', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse({ success: true, id: 'item-9' }));

      const item = await connection.addItem({
        title: 'Stops',
        type: 'CSV',
        tags: ['gtfs'],
        fileName: 'stops.txt',
        content: 'stop_id\ns1',
      });

      expect(item).toEqual({ id: 'item-9' });
      const { url, init } = request();
      expect(url).toBe('https://portal.example.test/sharing/rest/content/users/transit%20admin/addItem');

      const form = init?.body;
      expect(form).toBeInstanceOf(FormData);
      if (form instanceof FormData) {
        expect(form.get('title')).toBe('Stops');
        expect(form.get('type')).toBe('CSV');
        expect(form.get('tags')).toBe('gtfs');
        expect(form.get('f')).toBe('json');
        expect(form.get('token')).toBe('test-token');
        const file = form.get('file');
        if (file === null || typeof file === 'string') {
          throw new Error('expected a file part');
        }
        expect(file.name).toBe('stops.txt');
        await expect(file.text()).resolves.toBe('stop_id\ns1');
      }
    });

    it('creates a feature service from a definition', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse({ success: true, itemId: 'svc-1', serviceurl: SERVICE_URL }));
      const definition = buildServiceDefinition('GTFS Stops', 102100);

      const service = await connection.createFeatureService(definition);

      expect(service).toEqual({ itemId: 'svc-1', serviceUrl: SERVICE_URL, name: 'GTFS Stops' });
      expect(request().url).toBe('https://portal.example.test/sharing/rest/content/users/transit%20admin/createService');
      const body = formBody();
      expect(body.get('outputType')).toBe('featureService');
      expect(JSON.parse(body.get('createParameters') ?? '')).toEqual(definition);
    });

    it('adds layers through the admin endpoint and features through the layer endpoint', async () => {
      const service = connection.forService({ itemId: 'svc-1', serviceUrl: SERVICE_URL, name: 'GTFS Stops' });
      fetchMock
        .mockResolvedValueOnce(jsonResponse({ success: true }))
        .mockResolvedValueOnce(
          jsonResponse({ addResults: [{ objectId: 1, success: true }, { objectId: 2, success: true }] })
        );

      await service.addToDefinition([]);
      const added = await service.addFeatures(0, [
        { geometry: { x: 1, y: 2 }, attributes: { row_id: 0 } },
        { geometry: { x: 3, y: 4 }, attributes: { row_id: 1 } },
      ]);

      expect(request(0).url).toBe(
        'https://services.example.test/arcgis/rest/admin/services/GTFS_Stops/FeatureServer/addToDefinition'
      );
      expect(formBody(0).get('addToDefinition')).toBe('{"layers":[]}');

      expect(request(1).url).toBe(`${SERVICE_URL}/0/addFeatures`);
      expect(formBody(1).get('rollbackOnFailure')).toBe('true');
      expect(JSON.parse(formBody(1).get('features') ?? '')).toHaveLength(2);
      expect(added).toEqual({ added: 2, objectIds: [1, 2] });
    });

    it('sends analyze and generate as csv text', async () => {
      fetchMock
        .mockResolvedValueOnce(jsonResponse({ publishParameters: { type: 'csv', columnDelimiter: ',' } }))
        .mockResolvedValueOnce(
          jsonResponse({
            featureCollection: {
              layers: [
                { featureSet: { features: [{ geometry: { x: 1, y: 2 }, attributes: { row_id: 0 } }] } },
                { featureSet: { features: [{ geometry: { x: 3, y: 4 }, attributes: { row_id: 1 } }] } },
              ],
            },
          })
        );

      const parameters = await connection.analyze('a,b\n1,2');
      const features = await connection.generate('a,b\n1,2', { ...parameters, locationType: 'coordinates' });

      expect(parameters).toEqual({ type: 'csv', columnDelimiter: ',' });
      expect(request(0).url).toBe('https://portal.example.test/sharing/rest/content/features/analyze');
      expect(formBody(0).get('filetype')).toBe('csv');
      expect(formBody(0).get('text')).toBe('a,b\n1,2');

      expect(request(1).url).toBe('https://portal.example.test/sharing/rest/content/features/generate');
      expect(JSON.parse(formBody(1).get('publishParameters') ?? '')).toEqual({
        type: 'csv',
        columnDelimiter: ',',
        locationType: 'coordinates',
      });
      expect(features.map((feature) => feature.attributes.row_id)).toEqual([0, 1]);
    });

    it('shares an item with groups, everyone and the organization', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse({ notSharedWith: [], itemId: 'item-1' }));

      await connection.shareItem('item-1', { groups: ['g1', 'g2'], everyone: true, org: true });

      expect(request().url).toBe(
        'https://portal.example.test/sharing/rest/content/users/transit%20admin/items/item-1/share'
      );
      const body = formBody();
      expect(body.get('groups')).toBe('g1,g2');
      expect(body.get('everyone')).toBe('true');
      expect(body.get('org')).toBe('true');
    });
  });

  describe('failures', () => {
    it('reports a network failure', async () => {
      fetchMock.mockRejectedValueOnce(new TypeError('fetch failed'));
      const error = await captureError(connection.createGroup({ title: 't', access: 'account', description: '' }));
      expect(error.message).toBe('createGroup failed: network error: fetch failed');
    });

    it('reports a non-2xx status with its code', async () => {
      fetchMock.mockResolvedValueOnce(new Response('', { status: 500, statusText: 'Internal Server Error' }));
      const error = await captureError(connection.analyze('a\n1'));
      expect(error.message).toBe('analyze failed: HTTP 500 Internal Server Error');
      expect(error.code).toBe(500);
    });

    it('reports an error body returned with status 200', async () => {
      fetchMock.mockResolvedValueOnce(
        jsonResponse({ error: { code: 498, message: 'Invalid token.', details: ['token expired'] } })
      );
      const error = await captureError(connection.analyze('a\n1'));
      expect(error.message).toBe('analyze failed: Invalid token.');
      expect(error.code).toBe(498);
      expect(error.details).toEqual(['token expired']);
    });

    it('reports a body that cannot be read', async () => {
      const response = jsonResponse({ publishParameters: {} });
      vi.spyOn(response, 'text').mockRejectedValue(new TypeError('terminated'));
      fetchMock.mockResolvedValueOnce(response);

      const error = await captureError(connection.analyze('a\n1'));
      expect(error).toBeInstanceOf(RemoteCallError);
      expect(error.message).toBe('analyze failed: failed to read response: terminated');
    });

    it('reports a body that is not JSON', async () => {
      fetchMock.mockResolvedValueOnce(new Response('<html>', { status: 200 }));
      const error = await captureError(connection.generate('a\n1', {}));
      expect(error.message.startsWith('generate failed: invalid JSON response: ')).toBe(true);
    });

    it('reports a response missing expected fields', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse({ success: true }));
      const error = await captureError(connection.createGroup({ title: 't', access: 'account', description: '' }));
      expect(error.message).toBe('createGroup failed: unexpected response shape');
      expect(error.details).toEqual(['group: Required']);
    });

    it('fails when any feature is rejected', async () => {
      fetchMock.mockResolvedValueOnce(
        jsonResponse({
          addResults: [
            { objectId: 1, success: true },
            { success: false, error: { code: 1000, description: 'Invalid geometry' } },
          ],
        })
      );
      const service = connection.forService({ itemId: 'svc-1', serviceUrl: SERVICE_URL, name: 'GTFS Stops' });

      const error = await captureError(
        service.addFeatures(1, [
          { geometry: { paths: [] }, attributes: {} },
          { geometry: { paths: [] }, attributes: {} },
        ])
      );
      expect(error.message).toBe('addFeatures(layer 1) failed: 1 of 2 features rejected');
      expect(error.code).toBe(1000);
      expect(error.details).toEqual(['Invalid geometry']);
    });

    it('fails when the layer definitions are not accepted', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse({ success: false }));
      const service = connection.forService({ itemId: 'svc-1', serviceUrl: SERVICE_URL, name: 'GTFS Stops' });
      const error = await captureError(service.addToDefinition([]));
      expect(error.message).toBe('addToDefinition failed: service GTFS Stops rejected the layer definitions');
    });

    it('fails when an item could not be shared with every target', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse({ notSharedWith: ['g2'] }));
      const error = await captureError(connection.shareItem('item-1', { groups: ['g2'], everyone: true, org: true }));
      expect(error.message).toBe('share(item-1) failed: not shared with g2');
    });
  });

  it('maps a public service url to its admin url', () => {
    expect(toAdminServiceUrl(SERVICE_URL)).toBe(
      'https://services.example.test/arcgis/rest/admin/services/GTFS_Stops/FeatureServer'
    );
  });
});
