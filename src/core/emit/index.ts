// src/core/emit/index.ts
export {
  type DoReturnStyle,
  type EmitOptions,
  DEFAULT_EMIT_OPTIONS,
  emit,
  formatFloat,
  isOperatorLike,
  isSpecialForm,
} from "./nim";
