/**
 * HTTP options for CloudApiClient requests
 *
 * @module server/integrations/httpTypes
 */

import type { FieldMap } from '../telemetry/types';

export type HttpMethod = 'GET' | 'PUT' | 'POST';

export interface HttpOpts {
    /** Request timeout in milliseconds (default: client timeout) */
    timeout?: number;
    /** Query parameters, signed and appended in canonical order */
    params?: FieldMap;
    /** JSON body, signed in flattened form */
    body?: FieldMap;
}
