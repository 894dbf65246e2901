/** Legacy one-input, three-output transaction (p2pkh, null data, p2pkh). */
export const ThreeOutputTxRaw =
  "010000000142c4ccc0db9a4639748b350f15fff0e674c6e27b4e9f35aa91ef9eedaecadabe020000006a473044022034577ba0f2fbc54ff60d846555c23b74b9ae2721d95f5758453581ecd2a133400220258d4ffa96bf26e6b3563111ec1012dae1c7b7123adfe0fbaeddcdc682e6493341210377efa9937bd4a52edc99f431e2d61f888c173498ded048642343a8133b07c42bffffffff0360090000000000001976a91444800da3829882d058f5938992b16b53e0c3cb5188ac000000000000000039006a076273767465737427756c57592b3834485a623032767a3369533236393044513d3d2c6d3130372c74622c61302e30310474657874014205460000000000001976a914e3b111de8fec527b41f4189e313638075d96ccd688ac00000000";

export const ThreeOutputTxId =
  "20cb9b2944f19c9c2e7424fa2d710b7c3adbb2701f1a4c9505f5db94d6af331b";
