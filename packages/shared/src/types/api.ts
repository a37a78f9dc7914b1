/**
 * Error response body
 */
export interface ApiErrorResponse {
  error: string;
  error_description?: string;
}

export interface ProviderListItem {
  name: string;
  entityId: string;
  loginUrl: string;
}

export interface ProviderListResponse {
  providers: ProviderListItem[];
}

/**
 * Body returned by the assertion consumer service
 */
export interface SamlLoginResponse {
  success: true;
  user_id: string;
  is_new_user: boolean;
  provider: string;
  provider_user_id: string;
  session_index: string | null;
  user_data: {
    full_name: string | null;
    first_name: string | null;
    last_name: string | null;
    username: string | null;
    email: string | null;
  };
}
