export * from "./schema/location_sample_v1";
export * from "./schema/start_request_v1";
export * from "./schema/fetch_window_v1";
export * from "./schema/user_data_response_v1";
export * from "./schema/session_status_v1";
