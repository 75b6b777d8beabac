export { extractFileLinksFromHtml } from "./htmlParser";
