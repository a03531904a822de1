import { createTailwindConfig } from "./src/tailwindConfig";

export default createTailwindConfig();
