export { glider, rPentomino, lightWeightSpaceship } from "./creatures";
export { encodeAscii, decodeAscii } from "./ascii-format";
export { encodeBinary, decodeBinary } from "./binary-format";
export { loadAscii, saveAscii, loadBinary, saveBinary } from "./file-io";
