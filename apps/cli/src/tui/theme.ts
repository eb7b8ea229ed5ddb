export const colors = {
  primary: "#00ff41",
  secondary: "#ffb000",
  dimmed: "#666666",
  error: "#ff3333",
  warning: "#ffaa00",
  text: "#cccccc",
  border: "#333333",
  white: "#ffffff",
  cyan: "#00ffff",
};
