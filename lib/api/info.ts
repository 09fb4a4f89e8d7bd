/** Snake appearance and API version reported on the info route. */
export const INFO = {
  apiversion: "1",
  author: "",
  color: "#6A4C93",
  head: "default",
  tail: "default",
  version: "0.1.0",
};
