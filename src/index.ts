// ── Kernel ───────────────────────────────────────────────────────────────────
export * from './kernel/types';
export * from './kernel/schemas';
export * from './kernel/event_bus';
export * from './kernel/event_queue';
export * from './kernel/config_store';
export * from './kernel/pointer_id_allocator';
export * from './kernel/timer_arena';
export * from './kernel/touch_emitter';
export * from './kernel/plugin_supervisor';

// ── Geometry ─────────────────────────────────────────────────────────────────
export * from './geometry/vector';
export * from './geometry/boundary_geometry';
export * from './geometry/angle_warp';
export * from './geometry/pointer_mapper';
export * from './geometry/perspective_ellipse';
export * from './geometry/vertical_ratio_mapping';

// ── Calibration ──────────────────────────────────────────────────────────────
export * from './calibration/sanitize';
export * from './calibration/calibration_store';
export * from './calibration/ideal_calibration';
export * from './calibration/circle_tilt';

// ── Widgets ──────────────────────────────────────────────────────────────────
export * from './plugins/widget_capabilities';
export * from './plugins/joystick_widget';
export * from './plugins/walk_joystick_plugin';
export * from './plugins/skill_cast_plugin';
