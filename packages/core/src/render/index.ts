export { checkRenderable, type RenderOptions, render, renderTfvars } from "./tfvars";
