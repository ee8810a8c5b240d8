export * from "./schema/risk_status_v1";
export * from "./schema/sensor_reading_v1";
export * from "./schema/risk_config_v1";
export * from "./schema/risk_state_v1";
export * from "./schema/decision_record_v1";
