export {
  type Either,
  Left,
  Right,
  isLeft,
  isRight,
  map,
  getOrThrow,
} from "./either.js";
