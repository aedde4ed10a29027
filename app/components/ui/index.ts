export { Button } from "./Button";
export { Notice } from "./Notice";
export type { NoticeData, NoticeTone } from "./Notice";
export { Typography } from "./Typography";
export { ServiceErrorNotice } from "./ServiceErrorNotice";
