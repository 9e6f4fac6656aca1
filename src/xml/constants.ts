export const xmlDeclaration = '<?xml version="1.0" encoding="UTF-8"?>';
export const plistDoctype = '<!DOCTYPE plist PUBLIC "-//Apple//DTD PLIST 1.0//EN" "http://www.apple.com/DTDs/PropertyList-1.0.dtd">';
export const plistVersion = '1.0';

/** fast-xml-parser's key for text content in `preserveOrder` trees */
export const textNodeName = '#text';
/** fast-xml-parser's key for the attributes of an element in `preserveOrder` trees */
export const attributesNodeName = ':@';
/** key given to CDATA sections, so their text is kept apart from entity-encoded text */
export const cdataNodeName = '#cdata';
