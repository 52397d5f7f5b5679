export type { Brand } from "./brand";
export {
  is_non_negative_integer,
  is_power_of_two,
  validate_and_cast,
} from "./assertions";
export { TYPE_ERROR, TypeError } from "./error";
