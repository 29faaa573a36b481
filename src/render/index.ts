export {
  renderSupportersPage,
  renderSupporterCard,
  DEFAULT_RENDER_OPTIONS,
} from "./renderSupportersPage";
