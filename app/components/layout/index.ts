export { AccountMenu } from "./AccountMenu";
export { Container } from "./Container";
export { Header } from "./Header";
export type { NavItem } from "./Header";
export { MobileMenu } from "./MobileMenu";
export { Shell } from "./Shell";
