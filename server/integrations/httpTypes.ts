/**
 * HTTP Options for BaseAdapter requests
 *
 * @module server/integrations/httpTypes
 */

export interface HttpOpts {
    /** URL query parameters */
    params?: Record<string, string | number>;
}
