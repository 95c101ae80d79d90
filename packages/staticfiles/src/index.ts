/**
 * @spaserve/staticfiles - Static file responses for web-standard handlers
 */

export {contentType, serveContent, type ServableContent} from "./content.js";
export {serveFile} from "./handler.js";
