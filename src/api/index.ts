import { API } from "../lib/index.js";

export default new API(
	{
		"./posts/GET.ts": () => import("./posts/GET.js"),
		"./posts/POST.ts": () => import("./posts/POST.js"),
		"./posts/[id]/GET.ts": () => import("./posts/[id]/GET.js"),
		"./posts/[id]/PUT.ts": () => import("./posts/[id]/PUT.js"),
		"./posts/[id]/DELETE.ts": () => import("./posts/[id]/DELETE.js"),
		"./posts/search/GET.ts": () => import("./posts/search/GET.js"),
	},
	{
		openapi: "3.0.0",
		info: {
			title: "Post Store API",
			version: "1.0.0",
			description: "CRUD and search over an in-memory collection of posts",
		},
	},
);
