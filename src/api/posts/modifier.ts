import type { RouteModifier } from "../../lib/index.js";

export const Modifier: RouteModifier = (r) => {
	r.tags = ["posts"];
	return r;
};
