import { BoundaryValidator, defineConfig } from "@jsonable/runtime";

/** Shared by every example consumer; validation is always on here. */
export const boundaries = new BoundaryValidator(defineConfig({ validation: true }));

export const validated = boundaries.decorator();
