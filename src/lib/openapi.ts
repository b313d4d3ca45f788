import type { RouteConfig } from "@asteasolutions/zod-to-openapi";
import { OpenAPIRegistry, OpenApiGeneratorV3 } from "@asteasolutions/zod-to-openapi";

export type OpenAPIObjectConfig = Parameters<OpenApiGeneratorV3["generateDocument"]>[0];
export type OpenAPIDocument = ReturnType<OpenApiGeneratorV3["generateDocument"]>;
export type RouteMethod = RouteConfig["method"];

export { OpenAPIRegistry, OpenApiGeneratorV3, type RouteConfig };
