import { ConfigProvider, theme } from "antd";
import { DemoLayout } from "./components/DemoLayout.js";
import { bus } from "./bus.js";

export default function App() {
  return (
    <ConfigProvider
      theme={{
        algorithm: theme.darkAlgorithm,
        token: {
          colorPrimary: "#2F6BFF",
          fontSize: 13
        }
      }}
    >
      <DemoLayout bus={bus} />
    </ConfigProvider>
  );
}
