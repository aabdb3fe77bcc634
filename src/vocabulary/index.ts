export { loadVocabulary, compileVocabulary } from "./loader";
